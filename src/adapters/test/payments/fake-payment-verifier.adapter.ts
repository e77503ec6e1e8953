// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/payments/fake-payment-verifier`
 * Purpose: Fake payment provider lookup for deterministic testing.
 * Scope: Returns transactions registered by tests, keyed by reference. Does not perform real provider calls.
 * Invariants: Unknown references resolve to null (provider has no such transaction).
 * Side-effects: none (in-memory only)
 * Notes: Configure via setTransaction/setError. Tracks calls for assertions.
 * Links: Implements PaymentVerifier port
 * @public
 */

import type { VerifiedTransaction } from "@/core/payments/public";
import { PaymentProviderError, type PaymentVerifier } from "@/ports";

export class FakePaymentVerifier implements PaymentVerifier {
  private readonly transactions = new Map<string, VerifiedTransaction>();
  private error: PaymentProviderError | null = null;

  public readonly calls: string[] = [];

  setTransaction(transaction: VerifiedTransaction): void {
    this.transactions.set(transaction.reference, transaction);
  }

  /** Make every lookup fail as if the provider were unreachable */
  setError(status: number | undefined = 503): void {
    this.error = new PaymentProviderError("Fake provider failure", status);
  }

  reset(): void {
    this.transactions.clear();
    this.error = null;
    this.calls.length = 0;
  }

  async verifyTransaction(
    reference: string,
    _abortSignal: AbortSignal
  ): Promise<VerifiedTransaction | null> {
    this.calls.push(reference);
    if (this.error) throw this.error;
    const transaction = this.transactions.get(reference);
    return transaction ? { ...transaction } : null;
  }
}

// ============================================================================
// Test Singleton Accessor (APP_ENV=test only)
// ============================================================================

let _testInstance: FakePaymentVerifier | null = null;

export function getTestPaymentVerifier(): FakePaymentVerifier {
  if (!_testInstance) {
    _testInstance = new FakePaymentVerifier();
  }
  return _testInstance;
}

export function resetTestPaymentVerifier(): void {
  if (_testInstance) {
    _testInstance.reset();
  }
}
