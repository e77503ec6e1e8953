// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/subscriptions/services/lifecycle`
 * Purpose: Payment-lapse transitions on the current record (past_due, cancelled).
 * Scope: Status updates only. Access keeps running to periodEnd; grace applies after it.
 * Invariants: Expired records are terminal and are not moved back.
 * Side-effects: IO (via SubscriptionRepository)
 * @public
 */

import {
  type AccessStatus,
  deriveAccessState,
  NoCurrentSubscriptionError,
  type SubscriptionStatus,
} from "@/core/subscriptions/public";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import type { SubscriptionDeps } from "./deps";

async function transition(
  deps: SubscriptionDeps,
  accountId: string,
  status: Extract<SubscriptionStatus, "past_due" | "cancelled">,
  ctx: RequestContext
): Promise<AccessStatus> {
  const now = new Date(ctx.clock.now());
  const current = await deps.subscriptions.getCurrent(accountId);
  if (!current) throw new NoCurrentSubscriptionError(accountId);

  if (current.status === "expired" || current.status === status) {
    return deriveAccessState(current, now, deps.graceWindowMs);
  }

  await deps.subscriptions.updateStatus(current.id, status);

  logEvent(ctx.log, EVENT_NAMES.SUBSCRIPTION_STATUS_CHANGED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    accountId,
    from: current.status,
    to: status,
  });

  return deriveAccessState({ ...current, status }, now, deps.graceWindowMs);
}

export function markPastDue(
  deps: SubscriptionDeps,
  accountId: string,
  ctx: RequestContext
): Promise<AccessStatus> {
  return transition(deps, accountId, "past_due", ctx);
}

export function cancelSubscription(
  deps: SubscriptionDeps,
  accountId: string,
  ctx: RequestContext
): Promise<AccessStatus> {
  return transition(deps, accountId, "cancelled", ctx);
}
