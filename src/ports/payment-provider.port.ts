// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/payment-provider.port`
 * Purpose: Authoritative transaction lookup against the payment provider, used to re-verify webhook claims.
 * Scope: Provider-neutral read-only interface. Does not verify webhook signatures.
 * Invariants: Read-only; bounded by the caller's AbortSignal; never trusts webhook body fields.
 * Side-effects: none (interface definition only)
 * Links: Implemented by PaystackVerifierAdapter and FakePaymentVerifierAdapter (test)
 * @public
 */

import type { VerifiedTransaction } from "@/core/payments/public";

/**
 * Thrown when the provider cannot be reached or answers with something other than a transaction.
 */
export class PaymentProviderError extends Error {
  constructor(
    message: string,
    public readonly status: number | undefined
  ) {
    super(message);
    this.name = "PaymentProviderError";
  }
}

export function isPaymentProviderError(
  error: unknown
): error is PaymentProviderError {
  return error instanceof Error && error.name === "PaymentProviderError";
}

export interface PaymentVerifier {
  /**
   * Look up a transaction by provider reference.
   * @returns null when the provider reports no such transaction
   * @throws PaymentProviderError on transport or provider failure
   */
  verifyTransaction(
    reference: string,
    abortSignal: AbortSignal
  ): Promise<VerifiedTransaction | null>;
}
