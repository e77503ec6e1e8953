// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/subscriptions/services/applyIfDue`
 * Purpose: Apply a due scheduled plan change with zero gap.
 * Scope: Resolve the pending plan, then hand the new record to the store, which inserts it and clears the pending fields together. Does not schedule changes.
 * Invariants:
 *   - APPLY_ONCE: the store applies a pending change to exactly one caller
 *   - NO_PARTIAL_APPLY: the pending fields are cleared in the same transaction that inserts the new record; any failure leaves the change pending
 *   - ZERO_GAP: the new period starts exactly at the previous periodEnd
 * Side-effects: IO (via SubscriptionRepository)
 * Links: core/subscriptions/rules.ts isPendingChangeDue, activatePlan.ts
 * @public
 */

import {
  isPendingChangeDue,
  type SubscriptionRecord,
} from "@/core/subscriptions/public";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import { buildActivation, logActivation } from "./activatePlan";
import type { SubscriptionDeps } from "./deps";

/**
 * @returns the newly activated record, or null when nothing was due (or another caller applied it)
 * @throws UnknownPlanError when the pending plan is no longer offered; the change stays pending
 */
export async function applyIfDue(
  deps: SubscriptionDeps,
  accountId: string,
  ctx: RequestContext
): Promise<SubscriptionRecord | null> {
  const now = new Date(ctx.clock.now());
  const current = await deps.subscriptions.getCurrent(accountId);
  if (!current?.pendingPlanCode || !isPendingChangeDue(current, now)) {
    return null;
  }

  const params = await buildActivation(
    deps,
    {
      accountId,
      planCode: current.pendingPlanCode,
      source: "scheduled",
      startsAt: current.periodEnd,
    },
    ctx
  );

  const record = await deps.subscriptions.applyPendingChange(
    current.id,
    now,
    params
  );
  if (!record) return null;

  logActivation(ctx, record, params.creditsGranted);
  logEvent(ctx.log, EVENT_NAMES.SUBSCRIPTION_SCHEDULED_APPLIED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    accountId,
    fromPlanCode: current.planCode,
    planCode: record.planCode,
    periodStart: record.periodStart.toISOString(),
  });

  return record;
}
