// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/subscriptions/services/schedulePlanChange`
 * Purpose: Schedule a plan to take over when the current period ends.
 * Scope: Sets the pending fields on the current record. Does not apply the change (applyIfDue does).
 * Invariants: effectiveAt is the current periodEnd; a later schedule replaces an earlier one.
 * Side-effects: IO (via SubscriptionRepository)
 * Links: applyIfDue.ts
 * @public
 */

import {
  type AccessStatus,
  deriveAccessState,
  grantsAccess,
  NoCurrentSubscriptionError,
  type SubscriptionRecord,
  UnknownPlanError,
} from "@/core/subscriptions/public";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import type { SubscriptionDeps } from "./deps";

export interface SchedulePlanChangeInput {
  accountId: string;
  planCode: string;
}

export interface ScheduledChange {
  record: SubscriptionRecord;
  status: AccessStatus;
}

/**
 * @throws UnknownPlanError when the next plan is missing or inactive
 * @throws NoCurrentSubscriptionError when the account has no record that still grants access
 */
export async function schedulePlanChange(
  deps: SubscriptionDeps,
  input: SchedulePlanChangeInput,
  ctx: RequestContext
): Promise<ScheduledChange> {
  const plan = await deps.plans.getPlan(input.planCode);
  if (!plan) throw new UnknownPlanError(input.planCode);

  const now = new Date(ctx.clock.now());
  const current = await deps.subscriptions.getCurrent(input.accountId);
  if (
    !current ||
    !grantsAccess(deriveAccessState(current, now, deps.graceWindowMs).state)
  ) {
    throw new NoCurrentSubscriptionError(input.accountId);
  }

  const record = await deps.subscriptions.setPendingChange(current.id, {
    planCode: plan.planCode,
    effectiveAt: current.periodEnd,
  });

  logEvent(ctx.log, EVENT_NAMES.SUBSCRIPTION_CHANGE_SCHEDULED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    accountId: input.accountId,
    fromPlanCode: current.planCode,
    planCode: plan.planCode,
    effectiveAt: current.periodEnd.toISOString(),
  });

  return {
    record,
    status: deriveAccessState(record, now, deps.graceWindowMs),
  };
}
