// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/subscriptions/services/subscriptionStatus`
 * Purpose: Current access status of an account after applying any due scheduled change.
 * Scope: Read path used by the status route and the entitlement gate.
 * Invariants: applyIfDue always runs before the state is derived. A pending plan that is no longer offered stays pending and is logged; store errors propagate.
 * Side-effects: IO (via SubscriptionRepository)
 * @public
 */

import {
  type AccessStatus,
  deriveAccessState,
  isUnknownPlanError,
  type SubscriptionRecord,
} from "@/core/subscriptions/public";
import type { RequestContext } from "@/shared/observability";

import { applyIfDue } from "./applyIfDue";
import type { SubscriptionDeps } from "./deps";

export interface SubscriptionSnapshot {
  record: SubscriptionRecord | null;
  status: AccessStatus;
}

export async function getSubscriptionSnapshot(
  deps: SubscriptionDeps,
  accountId: string,
  ctx: RequestContext
): Promise<SubscriptionSnapshot> {
  try {
    await applyIfDue(deps, accountId, ctx);
  } catch (error) {
    if (!isUnknownPlanError(error)) throw error;
    ctx.log.error(
      { err: error, accountId },
      "scheduled plan change references an unknown plan"
    );
  }
  const record = await deps.subscriptions.getCurrent(accountId);
  return {
    record,
    status: deriveAccessState(
      record,
      new Date(ctx.clock.now()),
      deps.graceWindowMs
    ),
  };
}

export async function getSubscriptionStatus(
  deps: SubscriptionDeps,
  accountId: string,
  ctx: RequestContext
): Promise<AccessStatus> {
  const { status } = await getSubscriptionSnapshot(deps, accountId, ctx);
  return status;
}
