// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/entitlements/public`
 * Purpose: Public surface for entitlement rules and decision types.
 * Side-effects: none
 * @public
 */

export type {
  CacheAdmission,
  CreditDecision,
  CreditDetails,
  CreditReservation,
  DenialReason,
  EntitlementDecision,
  EntitlementDenial,
  EntitlementVia,
  InteractionMode,
  QuotaDetails,
} from "./model";
export { INTERACTION_MODES } from "./model";
export {
  creditCostForMode,
  denialMessage,
  MODE_CREDIT_COST,
  nextUtcMidnight,
  resolveDailyCacheLimit,
  utcDayKey,
} from "./rules";
