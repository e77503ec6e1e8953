// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/subscriptions/services/activatePlan`
 * Purpose: Append a new current subscription record for a plan and seed its credit balance.
 * Scope: Plan lookup, period arithmetic and the activation write. Does not check payments or trial eligibility.
 * Invariants:
 *   - Period end is the explicit expiry or start + plan.durationDays; it must be after the start
 *   - Status is trial for the trial plan, otherwise active
 *   - Credit balance is overwritten with plan.aiCreditsTotal in the same store transaction
 * Side-effects: IO (via SubscriptionRepository)
 * Links: core/subscriptions/rules.ts, ports/subscription.port.ts
 * @public
 */

import {
  type ActivationSource,
  computePeriodEnd,
  InvalidPeriodError,
  initialStatusFor,
  type SubscriptionRecord,
  TRIAL_PLAN_CODE,
  UnknownPlanError,
} from "@/core/subscriptions/public";
import type { ActivateSubscriptionParams } from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

import type { SubscriptionDeps } from "./deps";

export interface ActivatePlanInput {
  accountId: string;
  planCode: string;
  source: ActivationSource;
  startsAt?: Date | undefined;
  expiresAt?: Date | undefined;
  providerReference?: string | null | undefined;
}

/**
 * Resolve the plan and period for an activation without writing anything.
 * @throws UnknownPlanError when the plan is missing or inactive
 * @throws InvalidPeriodError when expiresAt is not after the start
 */
export async function buildActivation(
  deps: SubscriptionDeps,
  input: ActivatePlanInput,
  ctx: RequestContext
): Promise<ActivateSubscriptionParams> {
  const plan = await deps.plans.getPlan(input.planCode);
  if (!plan) throw new UnknownPlanError(input.planCode);

  const now = new Date(ctx.clock.now());
  const periodStart = input.startsAt ?? now;
  const periodEnd =
    input.expiresAt ?? computePeriodEnd(periodStart, plan.durationDays);
  if (periodEnd.getTime() <= periodStart.getTime()) {
    throw new InvalidPeriodError(periodStart, periodEnd);
  }

  return {
    accountId: input.accountId,
    planCode: plan.planCode,
    status: initialStatusFor(plan.planCode, TRIAL_PLAN_CODE),
    periodStart,
    periodEnd,
    source: input.source,
    providerReference: input.providerReference ?? null,
    creditsGranted: plan.aiCreditsTotal,
    createdAt: now,
  };
}

export function logActivation(
  ctx: RequestContext,
  record: SubscriptionRecord,
  creditsGranted: number
): void {
  logEvent(ctx.log, EVENT_NAMES.SUBSCRIPTION_ACTIVATED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    accountId: record.accountId,
    planCode: record.planCode,
    source: record.source,
    periodEnd: record.periodEnd.toISOString(),
    creditsGranted,
  });
}

/**
 * @throws UnknownPlanError when the plan is missing or inactive
 * @throws InvalidPeriodError when expiresAt is not after the start
 */
export async function activatePlan(
  deps: SubscriptionDeps,
  input: ActivatePlanInput,
  ctx: RequestContext
): Promise<SubscriptionRecord> {
  const params = await buildActivation(deps, input, ctx);
  const record = await deps.subscriptions.activate(params);
  logActivation(ctx, record, params.creditsGranted);
  return record;
}
