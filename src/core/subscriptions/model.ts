// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/subscriptions/model`
 * Purpose: Domain entities for plans, subscription records and derived access status.
 * Scope: Types and constants only. Does not implement state derivation or persistence.
 * Invariants: Records are append-only per activation; the current record is the one with the latest periodEnd.
 * Side-effects: none
 * Links: rules.ts, ports/subscription.port.ts
 * @public
 */

export const SUBSCRIPTION_STATUSES = [
  "trial",
  "active",
  "past_due",
  "cancelled",
  "expired",
] as const;

/** Stored status of a subscription record */
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

/** Derived, time-dependent access state */
export type AccessState = "trial" | "active" | "grace" | "expired";

export type AccessReason =
  | "no_subscription"
  | "within_period"
  | "within_grace"
  | "period_ended"
  | "grace_ended"
  | "marked_expired"
  | "not_started";

export type ActivationSource = "trial" | "payment" | "admin" | "scheduled";

export interface Plan {
  planCode: string;
  name: string;
  /** Integer amount in the currency's major unit */
  price: number;
  currency: string;
  durationDays: number;
  /** Credit balance seeded on activation (overwrite, not accumulate) */
  aiCreditsTotal: number;
  /** Cache-served answers per UTC day; null = deployment default, <= 0 = unlimited */
  dailyCacheLimit: number | null;
  active: boolean;
}

export interface SubscriptionRecord {
  id: string;
  accountId: string;
  planCode: string;
  status: SubscriptionStatus;
  periodStart: Date;
  periodEnd: Date;
  pendingPlanCode: string | null;
  pendingEffectiveAt: Date | null;
  source: ActivationSource;
  providerReference: string | null;
  createdAt: Date;
}

export interface PendingPlanChange {
  planCode: string;
  effectiveAt: Date;
}

export interface AccessStatus {
  state: AccessState;
  /** True for trial, active and grace */
  active: boolean;
  reason: AccessReason;
  planCode: string | null;
  expiresAt: Date | null;
  graceUntil: Date | null;
  pending: PendingPlanChange | null;
}
