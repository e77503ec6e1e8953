// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/jobs/subscriptionSweep.job`
 * Purpose: Job module that wires the subscription sweep to the application container.
 * Scope: Acquires the job lock, builds a job context, resolves deps, and calls sweepSubscriptions. Does not contain business logic.
 * Invariants:
 *   - SINGLE_WRITER: JobLock (pg advisory lock in production) prevents concurrent sweeps
 *   - A skipped run (lock held elsewhere) reports skipped=true and changes nothing
 * Side-effects: IO (database via ports)
 * Links: features/subscriptions/services/sweepSubscriptions.ts, scripts/subscription-sweep.ts
 * @public
 */

import { getContainer, resolveSubscriptionDeps } from "@/bootstrap/container";
import {
  type SweepSummary,
  sweepSubscriptions,
} from "@/features/subscriptions/public";
import { createJobContext } from "@/shared/observability";

export const SUBSCRIPTION_SWEEP_LOCK = "subscription_sweep";

export type SubscriptionSweepJobResult =
  | ({ skipped: false } & SweepSummary)
  | { skipped: true };

export async function runSubscriptionSweepJob(): Promise<SubscriptionSweepJobResult> {
  const container = getContainer();
  const ctx = createJobContext(
    { baseLog: container.log, clock: container.clock },
    { jobId: "subscriptions.sweep" }
  );

  ctx.log.info({}, "Starting subscription sweep job");

  const run = await container.jobLock.runExclusive(
    SUBSCRIPTION_SWEEP_LOCK,
    () => sweepSubscriptions(resolveSubscriptionDeps(container), ctx)
  );

  if (!run.acquired) {
    ctx.log.info({}, "Subscription sweep already running, skipping");
    return { skipped: true };
  }
  return { skipped: false, ...run.result };
}
