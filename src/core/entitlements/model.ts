// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/entitlements/model`
 * Purpose: Types for entitlement decisions: interaction modes, denial reasons, credit reservations.
 * Scope: Types and constants only. Does not perform checks.
 * Invariants: Denials are business outcomes, not errors.
 * Side-effects: none
 * @public
 */

export const INTERACTION_MODES = ["text", "voice"] as const;

export type InteractionMode = (typeof INTERACTION_MODES)[number];

/** How an allowed answer is paid for */
export type EntitlementVia = "library" | "cache" | "credit";

export type DenialReason =
  | "subscription_required"
  | "cache_limit_reached"
  | "no_credits";

export interface QuotaDetails {
  used: number;
  limit: number;
  /** Next UTC midnight, when the daily counter rolls over */
  resetsAt: Date;
}

export interface CreditDetails {
  balance: number;
  cost: number;
}

/** Credit held for one generation attempt; released if generation fails. */
export interface CreditReservation {
  accountId: string;
  cost: number;
  balanceAfter: number;
}

export type EntitlementDecision =
  | { allowed: true; via: "library" }
  | { allowed: true; via: "cache"; usedToday: number }
  | { allowed: true; via: "credit"; reservation: CreditReservation }
  | { allowed: false; reason: "subscription_required" }
  | { allowed: false; reason: "cache_limit_reached"; quota: QuotaDetails }
  | { allowed: false; reason: "no_credits"; credit: CreditDetails };

export type EntitlementDenial = Extract<EntitlementDecision, { allowed: false }>;

/** Result of the daily quota step for a Cache-served answer */
export type CacheAdmission = Extract<
  EntitlementDecision,
  { via: "cache" } | { reason: "cache_limit_reached" }
>;

/** Result of the credit step for an AI-generated answer */
export type CreditDecision = Extract<
  EntitlementDecision,
  { via: "credit" } | { reason: "no_credits" }
>;
