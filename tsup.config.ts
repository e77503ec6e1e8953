// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `tsup.config`
 * Purpose: Build configuration for the batch-job entry points that run outside Next.js.
 * Scope: Compiles src/scripts/* to dist/scripts/* with path alias resolution.
 * @internal
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: [
    "src/scripts/subscription-sweep.ts",
    "src/scripts/translation-drain.ts",
  ],
  outDir: "dist/scripts",
  format: ["esm"],
  target: "node20",
  platform: "node",
  sourcemap: true,
  clean: true,
  bundle: true,
  // Externalize node_modules, but NOT @/ aliases
  external: [/^(?!@\/)(?!\.)[a-z@]/i],
  esbuildOptions(options) {
    options.alias = {
      "@": "./src",
    };
  },
});
