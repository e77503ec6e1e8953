// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/processed-payment.port`
 * Purpose: Idempotency markers for provider payment references.
 * Scope: Interface only. Does not verify payments or activate subscriptions.
 * Invariants:
 *   - UNIQUE_REFERENCE: at most one marker per provider reference
 *   - SINGLE_CLAIM: claim() succeeds for exactly one concurrent caller; success markers are never reclaimed
 *   - SUCCESS_AFTER_ACTIVATION: callers mark success only after the subscription change is stored
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzleProcessedPaymentRepository and InMemoryProcessedPaymentRepository
 * @public
 */

import type { ProcessedPayment } from "@/core/payments/public";

export interface PaymentSettlement {
  accountId: string;
  planCode: string;
  amount: number;
  currency: string;
}

export interface ProcessedPaymentRepository {
  find(reference: string): Promise<ProcessedPayment | null>;

  /**
   * Take the processing claim for a reference.
   * Succeeds when no marker exists, when the marker is failed, or when a
   * processing marker was last updated before `staleBefore`.
   */
  claim(reference: string, now: Date, staleBefore: Date): Promise<boolean>;

  markSuccess(
    reference: string,
    settlement: PaymentSettlement,
    at: Date
  ): Promise<void>;

  markFailed(reference: string, reason: string, at: Date): Promise<void>;
}
