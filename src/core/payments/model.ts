// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/payments/model`
 * Purpose: Domain types for payment fulfillment: processed-payment markers, provider-verified transactions, extracted metadata.
 * Scope: Types and constants only. Does not verify signatures or call providers.
 * Invariants: A marker with status success is terminal; references are unique per provider.
 * Side-effects: none
 * Links: rules.ts, features/payments/services/handlePaymentNotification.ts
 * @public
 */

/** Only this event type drives activation; all others are acknowledged and ignored */
export const PAYMENT_SUCCESS_EVENT = "charge.success";

export type UpgradeMode = "now" | "at_expiry";

export type ProcessedPaymentStatus = "processing" | "success" | "failed";

export interface ProcessedPayment {
  reference: string;
  status: ProcessedPaymentStatus;
  accountId: string | null;
  planCode: string | null;
  /** Minor units (kobo for NGN) as reported by the provider */
  amount: number | null;
  currency: string | null;
  failureReason: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Transaction as returned by the provider's authoritative lookup */
export interface VerifiedTransaction {
  reference: string;
  /** Provider transaction status, e.g. "success", "failed", "abandoned" */
  status: string;
  /** Minor units */
  amount: number;
  currency: string;
  paidAt: Date | null;
  metadata: unknown;
}

export interface PaymentMetadata {
  accountId: string;
  planCode: string;
  upgradeMode: UpgradeMode;
  email: string | null;
  waPhone: string | null;
}

export type PaymentRejectionReason =
  | "provider_not_successful"
  | "reference_mismatch"
  | "amount_mismatch"
  | "currency_mismatch"
  | "missing_account"
  | "missing_plan"
  | "unknown_plan"
  | "plan_not_purchasable";
