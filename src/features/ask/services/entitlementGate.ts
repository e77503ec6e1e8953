// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ask/services/entitlementGate`
 * Purpose: Ordered entitlement steps for one question: subscription check, daily cache quota, credit reservation.
 * Scope: Each step is one store operation. Does not look up answers.
 * Invariants:
 *   - QUOTA_ATOMIC: the daily counter is checked and incremented in a single statement
 *   - CREDIT_ATOMIC: the debit is conditional on balance >= cost; a denial leaves the balance unchanged
 *   - A Library serve consumes nothing
 *   - A released reservation adds exactly its cost back
 * Side-effects: IO (via DailyUsageCounter, CreditLedger, SubscriptionRepository)
 * Links: core/entitlements/rules.ts, features/subscriptions/public.ts
 * @public
 */

import {
  type CacheAdmission,
  type CreditDecision,
  type CreditReservation,
  creditCostForMode,
  type EntitlementDecision,
  type EntitlementVia,
  type InteractionMode,
  nextUtcMidnight,
  resolveDailyCacheLimit,
  utcDayKey,
} from "@/core/entitlements/public";
import type { AccessStatus } from "@/core/subscriptions/public";
import {
  getSubscriptionStatus,
  type SubscriptionDeps,
} from "@/features/subscriptions/public";
import {
  type CreditLedger,
  type DailyUsageCounter,
  isInsufficientCreditsPortError,
} from "@/ports";
import type { RequestContext } from "@/shared/observability";

export interface EntitlementGateDeps {
  subscription: SubscriptionDeps;
  ledger: CreditLedger;
  usage: DailyUsageCounter;
  /** Used when the plan sets no daily cache limit; <= 0 means unlimited */
  dailyCacheLimitDefault: number;
}

export type SubscriptionCheck =
  | { allowed: true; status: AccessStatus }
  | { allowed: false; reason: "subscription_required"; status: AccessStatus };

/** Access requires trial, active or grace; any due scheduled change is applied first. */
export async function checkSubscription(
  deps: EntitlementGateDeps,
  accountId: string,
  ctx: RequestContext
): Promise<SubscriptionCheck> {
  const status = await getSubscriptionStatus(deps.subscription, accountId, ctx);
  return status.active
    ? { allowed: true, status }
    : { allowed: false, reason: "subscription_required", status };
}

export async function admitCacheServe(
  deps: EntitlementGateDeps,
  input: { accountId: string; planCode: string | null },
  ctx: RequestContext
): Promise<CacheAdmission> {
  const plan = input.planCode
    ? await deps.subscription.plans.getPlan(input.planCode)
    : null;
  const limit = resolveDailyCacheLimit(
    plan?.dailyCacheLimit ?? null,
    deps.dailyCacheLimitDefault
  );
  const now = new Date(ctx.clock.now());

  const admission = await deps.usage.tryIncrement(
    input.accountId,
    utcDayKey(now),
    limit
  );
  if (admission.admitted) {
    return { allowed: true, via: "cache", usedToday: admission.count };
  }
  return {
    allowed: false,
    reason: "cache_limit_reached",
    quota: {
      used: admission.count,
      limit: limit ?? admission.count,
      resetsAt: nextUtcMidnight(now),
    },
  };
}

export async function reserveCredit(
  deps: EntitlementGateDeps,
  input: { accountId: string; mode: InteractionMode }
): Promise<CreditDecision> {
  const cost = creditCostForMode(input.mode);
  try {
    const balanceAfter = await deps.ledger.debit(input.accountId, cost);
    return {
      allowed: true,
      via: "credit",
      reservation: { accountId: input.accountId, cost, balanceAfter },
    };
  } catch (error) {
    if (isInsufficientCreditsPortError(error)) {
      return {
        allowed: false,
        reason: "no_credits",
        credit: { balance: error.previousBalance, cost },
      };
    }
    throw error;
  }
}

/** @returns balance after the refund */
export function releaseCredit(
  deps: EntitlementGateDeps,
  reservation: CreditReservation
): Promise<number> {
  return deps.ledger.refund(reservation.accountId, reservation.cost);
}

/**
 * Run the gate end to end for a known serving tier.
 * The ask pipeline calls the steps individually so each runs only when its tier is reached.
 */
export async function authorize(
  deps: EntitlementGateDeps,
  input: { accountId: string; mode: InteractionMode; via: EntitlementVia },
  ctx: RequestContext
): Promise<EntitlementDecision> {
  const check = await checkSubscription(deps, input.accountId, ctx);
  if (!check.allowed) return { allowed: false, reason: check.reason };

  switch (input.via) {
    case "library":
      return { allowed: true, via: "library" };
    case "cache":
      return admitCacheServe(
        deps,
        { accountId: input.accountId, planCode: check.status.planCode },
        ctx
      );
    case "credit":
      return reserveCredit(deps, input);
  }
}
