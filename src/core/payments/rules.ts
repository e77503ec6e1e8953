// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/payments/rules`
 * Purpose: Business rules for payment fulfillment: metadata extraction and provider-verification checks.
 * Scope: Pure validation functions. Does not perform I/O, signature checks or state mutations.
 * Invariants:
 *   - Activation requires an account id and a plan code from verified metadata
 *   - The provider must report success for the same reference
 *   - Paid amount (minor units) must cover the plan price; currency must match the plan
 *   - Only plans with a positive price can be bought
 * Side-effects: none (pure functions)
 * Notes: Provider metadata may arrive as an object or a JSON-encoded string.
 * Links: Used by handlePaymentNotification
 * @public
 */

import { PaymentMetadataError } from "./errors";
import type {
  PaymentMetadata,
  PaymentRejectionReason,
  UpgradeMode,
  VerifiedTransaction,
} from "./model";

/** Minor units per major currency unit (kobo per naira, cents per dollar) */
export const MINOR_UNITS_PER_MAJOR = 100;

/** A processing claim older than this may be taken over by a redelivery */
export const STALE_CLAIM_MS = 5 * 60 * 1000;

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value === "string") {
    try {
      return asRecord(JSON.parse(value));
    } catch {
      return {};
    }
  }
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function readString(
  record: Record<string, unknown>,
  ...keys: string[]
): string | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
  }
  return null;
}

function parseUpgradeMode(value: string | null): UpgradeMode {
  const v = (value ?? "").toLowerCase();
  return v === "at_expiry" || v === "upgrade_at_expiry" ? "at_expiry" : "now";
}

/**
 * Extract fulfillment metadata from a verified transaction.
 *
 * @throws PaymentMetadataError when account or plan is missing
 */
export function extractPaymentMetadata(
  reference: string,
  metadata: unknown
): PaymentMetadata {
  const record = asRecord(metadata);
  const accountId = readString(record, "account_id", "accountId");
  if (!accountId) throw new PaymentMetadataError(reference, "missing_account");

  const planCode = readString(record, "plan_code", "planCode", "plan");
  if (!planCode) throw new PaymentMetadataError(reference, "missing_plan");

  return {
    accountId,
    planCode: planCode.toLowerCase(),
    upgradeMode: parseUpgradeMode(readString(record, "upgrade_mode", "upgradeMode")),
    email: readString(record, "email"),
    waPhone: readString(record, "wa_phone", "waPhone"),
  };
}

/**
 * Check the provider's authoritative view of a transaction against the reference being fulfilled.
 * Returns null when the transaction can be trusted.
 */
export function checkVerifiedTransaction(
  reference: string,
  transaction: VerifiedTransaction
): PaymentRejectionReason | null {
  if (transaction.status.toLowerCase() !== "success") {
    return "provider_not_successful";
  }
  if (transaction.reference !== reference) return "reference_mismatch";
  return null;
}

/**
 * Check a paid amount against a plan price.
 * Plans without a price (trial, manual) are never sold.
 */
export function checkPaidAmount(
  plan: { price: number; currency: string },
  transaction: Pick<VerifiedTransaction, "amount" | "currency">
): PaymentRejectionReason | null {
  if (plan.price <= 0) return "plan_not_purchasable";
  if (transaction.currency.toUpperCase() !== plan.currency.toUpperCase()) {
    return "currency_mismatch";
  }
  if (transaction.amount < plan.price * MINOR_UNITS_PER_MAJOR) {
    return "amount_mismatch";
  }
  return null;
}

export function isClaimStale(updatedAt: Date, now: Date): boolean {
  return now.getTime() - updatedAt.getTime() >= STALE_CLAIM_MS;
}
