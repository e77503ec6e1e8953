// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/subscriptions/services/sweepSubscriptions`
 * Purpose: Batch pass that applies due scheduled changes and marks lapsed records expired.
 * Scope: Called by the subscription sweep job. Read paths stay correct without it; the sweep only makes stored statuses match.
 * Invariants:
 *   - Scheduled changes are applied before lapsed records are expired
 *   - One account failing does not stop the batch
 * Side-effects: IO (via SubscriptionRepository)
 * Links: bootstrap/jobs/subscriptionSweep.job.ts
 * @public
 */

import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import { applyIfDue } from "./applyIfDue";
import type { SubscriptionDeps } from "./deps";

const DEFAULT_SWEEP_BATCH_SIZE = 500;

export interface SweepSummary {
  scheduledApplied: number;
  scheduledFailed: number;
  expired: number;
}

export async function sweepSubscriptions(
  deps: SubscriptionDeps,
  ctx: RequestContext,
  options: { batchSize?: number | undefined } = {}
): Promise<SweepSummary> {
  const now = new Date(ctx.clock.now());
  const accounts = await deps.subscriptions.listAccountsWithDuePendingChanges(
    now,
    options.batchSize ?? DEFAULT_SWEEP_BATCH_SIZE
  );

  let scheduledApplied = 0;
  let scheduledFailed = 0;
  for (const accountId of accounts) {
    try {
      const applied = await applyIfDue(deps, accountId, ctx);
      if (applied) scheduledApplied++;
    } catch (error) {
      scheduledFailed++;
      ctx.log.error(
        { err: error, accountId },
        "scheduled plan change could not be applied"
      );
    }
  }

  const expired = await deps.subscriptions.expireLapsed(
    now,
    deps.graceWindowMs
  );

  const summary: SweepSummary = { scheduledApplied, scheduledFailed, expired };
  logEvent(ctx.log, EVENT_NAMES.SUBSCRIPTION_SWEEP_COMPLETE, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    ...summary,
  });
  return summary;
}
