// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/subscriptions/services/startTrial`
 * Purpose: Start the one lifetime trial for an account with no subscription history.
 * Scope: Eligibility check then trial activation. Does not decide when a trial should start.
 * Invariants: ONE_TRIAL_PER_LIFETIME: any existing record (trial or paid, expired or not) makes the account ineligible.
 * Side-effects: IO (via SubscriptionRepository)
 * Notes: Two concurrent first calls race on the store's one-trial index; the loser gets TrialNotEligibleError.
 * Links: activatePlan.ts
 * @public
 */

import {
  isTrialEligible,
  type SubscriptionRecord,
  TRIAL_PLAN_CODE,
  TrialNotEligibleError,
} from "@/core/subscriptions/public";
import type { RequestContext } from "@/shared/observability";

import { activatePlan } from "./activatePlan";
import type { SubscriptionDeps } from "./deps";

export async function startTrial(
  deps: SubscriptionDeps,
  accountId: string,
  ctx: RequestContext
): Promise<SubscriptionRecord> {
  const hasHistory = await deps.subscriptions.hasAnyRecord(accountId);
  if (!isTrialEligible(hasHistory)) {
    throw new TrialNotEligibleError(accountId);
  }
  return activatePlan(
    deps,
    { accountId, planCode: TRIAL_PLAN_CODE, source: "trial" },
    ctx
  );
}
