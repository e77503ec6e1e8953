// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/subscriptions/public`
 * Purpose: Public surface for the subscription domain.
 * Scope: Re-exports models, rules, errors and the built-in plan catalog.
 * Side-effects: none
 * @public
 */

export {
  InvalidPeriodError,
  isInvalidPeriodError,
  isNoCurrentSubscriptionError,
  isTrialNotEligibleError,
  isUnknownPlanError,
  NoCurrentSubscriptionError,
  TrialNotEligibleError,
  UnknownPlanError,
} from "./errors";
export type {
  AccessReason,
  AccessState,
  AccessStatus,
  ActivationSource,
  PendingPlanChange,
  Plan,
  SubscriptionRecord,
  SubscriptionStatus,
} from "./model";
export { SUBSCRIPTION_STATUSES } from "./model";
export {
  DEFAULT_PLANS,
  findDefaultPlan,
  MANUAL_PLAN_CODE,
  normalizePlanCode,
  TRIAL_PLAN_CODE,
} from "./plans";
export {
  computePeriodEnd,
  DAY_MS,
  DEFAULT_GRACE_WINDOW_DAYS,
  daysToMs,
  deriveAccessState,
  grantsAccess,
  initialStatusFor,
  isGraceEligibleStatus,
  isLapsedBeyondAccess,
  isPendingChangeDue,
  isTrialEligible,
  selectCurrentRecord,
} from "./rules";
