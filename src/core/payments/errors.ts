// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/payments/errors`
 * Purpose: Domain errors for payment fulfillment.
 * Scope: Error classes and type guards. Does not handle HTTP mapping.
 * Invariants: Each error carries a stable readonly code.
 * Side-effects: none
 * Links: rules.ts
 * @public
 */

/**
 * Thrown when a verified transaction does not say which account or plan it pays for.
 * Fulfillment refuses to guess rather than activate an unrelated account.
 */
export class PaymentMetadataError extends Error {
  public readonly code = "PAYMENT_METADATA_INVALID" as const;

  constructor(
    /** Provider reference of the transaction */
    public readonly reference: string,
    /** Which field is missing */
    public readonly reason: "missing_account" | "missing_plan"
  ) {
    super(`Payment ${reference} metadata invalid: ${reason}`);
    this.name = "PaymentMetadataError";
  }
}

export function isPaymentMetadataError(
  error: unknown
): error is PaymentMetadataError {
  return error instanceof Error && error.name === "PaymentMetadataError";
}
