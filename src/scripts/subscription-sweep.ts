// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@scripts/subscription-sweep`
 * Purpose: CLI entry point for the subscription sweep. Zero logic — delegates to job module.
 * Scope: Process lifecycle (exit codes, DB pool close) only. Does not contain business logic or wiring.
 * Invariants: CLI = zero wiring, zero logic.
 * Side-effects: IO
 * Links: src/bootstrap/jobs/subscriptionSweep.job.ts
 * @public
 */

import { closeDb } from "@/adapters/server";
import { runSubscriptionSweepJob } from "@/bootstrap/jobs/subscriptionSweep.job";
import { makeLogger } from "@/shared/observability";

const log = makeLogger({ job: "subscriptions.sweep" });

runSubscriptionSweepJob()
  .then(async (result) => {
    log.info(result, "Subscription sweep finished");
    await closeDb();
    log.flush();
    process.exit(0);
  })
  .catch(async (err: unknown) => {
    log.error({ err }, "Subscription sweep failed");
    await closeDb();
    log.flush();
    process.exit(1);
  });
