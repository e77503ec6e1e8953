// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/meta.livez.read.v1.contract`
 * Purpose: Contract for the liveness probe.
 * Scope: Process-level liveness only. Does not cover env, database, gateway or payment provider reachability.
 * Invariants: 200 means the HTTP server is serving; probes read the status code, not the body.
 * Side-effects: none
 * Links: /livez, app/(infra)/livez/route.ts
 * @internal
 */

import { z } from "zod";

export const metaLivezOutputSchema = z.object({
  status: z.literal("alive"),
  /** ISO-8601 server time */
  timestamp: z.string().datetime(),
  uptimeSeconds: z.number().int().nonnegative(),
});

export type MetaLivezOutput = z.infer<typeof metaLivezOutputSchema>;

export const metaLivezOperation = {
  id: "meta.livez.read.v1",
  summary: "Liveness probe",
  description:
    "Answers 200 while the process can serve requests. Performs no dependency checks.",
  input: null,
  output: metaLivezOutputSchema,
} as const;
