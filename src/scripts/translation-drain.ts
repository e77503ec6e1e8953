// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@scripts/translation-drain`
 * Purpose: CLI entry point for the translation backlog drain. Zero logic — delegates to job module.
 * Scope: Process lifecycle (exit codes, DB pool close) only.
 * Invariants: CLI = zero wiring, zero logic.
 * Side-effects: IO
 * Links: src/bootstrap/jobs/translationDrain.job.ts
 * @public
 */

import { closeDb } from "@/adapters/server";
import { runTranslationDrainJob } from "@/bootstrap/jobs/translationDrain.job";
import { makeLogger } from "@/shared/observability";

const log = makeLogger({ job: "translations.drain" });

runTranslationDrainJob()
  .then(async (result) => {
    log.info(result, "Translation drain finished");
    await closeDb();
    log.flush();
    process.exit(0);
  })
  .catch(async (err: unknown) => {
    log.error({ err }, "Translation drain failed");
    await closeDb();
    log.flush();
    process.exit(1);
  });
