// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/subscriptions/public`
 * Purpose: Single entrypoint for the subscriptions feature.
 * Scope: Re-exports subscription operations and their input/output types.
 * Side-effects: none
 * Links: Used by app facades, the ask pipeline, payment fulfillment and jobs
 * @public
 */

export { type ActivatePlanInput, activatePlan } from "./services/activatePlan";
export { applyIfDue } from "./services/applyIfDue";
export type { SubscriptionDeps } from "./services/deps";
export { cancelSubscription, markPastDue } from "./services/lifecycle";
export {
  type ScheduledChange,
  type SchedulePlanChangeInput,
  schedulePlanChange,
} from "./services/schedulePlanChange";
export { startTrial } from "./services/startTrial";
export {
  getSubscriptionSnapshot,
  getSubscriptionStatus,
  type SubscriptionSnapshot,
} from "./services/subscriptionStatus";
export {
  type SweepSummary,
  sweepSubscriptions,
} from "./services/sweepSubscriptions";
