// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/payments/memory-processed-payment`
 * Purpose: In-memory ProcessedPaymentRepository.
 * Scope: Marker claim semantics identical to the Drizzle upsert. Does not persist.
 * Invariants: claim() decides and writes before the first yield, so one of two concurrent deliveries wins.
 * Side-effects: none (in-memory only)
 * Links: Implements ProcessedPaymentRepository port
 * @public
 */

import type { ProcessedPayment } from "@/core/payments/public";
import type { PaymentSettlement, ProcessedPaymentRepository } from "@/ports";

import type { MemoryStore } from "../memory/store";

export class MemoryProcessedPaymentRepository
  implements ProcessedPaymentRepository
{
  constructor(private readonly store: MemoryStore) {}

  async find(reference: string): Promise<ProcessedPayment | null> {
    const marker = this.store.processedPayments.get(reference);
    return marker ? { ...marker } : null;
  }

  async claim(reference: string, now: Date, staleBefore: Date): Promise<boolean> {
    const existing = this.store.processedPayments.get(reference);
    if (!existing) {
      this.store.processedPayments.set(reference, {
        reference,
        status: "processing",
        accountId: null,
        planCode: null,
        amount: null,
        currency: null,
        failureReason: null,
        createdAt: now,
        updatedAt: now,
      });
      return true;
    }

    const reclaimable =
      existing.status === "failed" ||
      (existing.status === "processing" &&
        existing.updatedAt.getTime() < staleBefore.getTime());
    if (!reclaimable) return false;

    existing.status = "processing";
    existing.failureReason = null;
    existing.updatedAt = now;
    return true;
  }

  async markSuccess(
    reference: string,
    settlement: PaymentSettlement,
    at: Date
  ): Promise<void> {
    const marker = this.store.processedPayments.get(reference);
    if (!marker) return;
    marker.status = "success";
    marker.accountId = settlement.accountId;
    marker.planCode = settlement.planCode;
    marker.amount = settlement.amount;
    marker.currency = settlement.currency;
    marker.failureReason = null;
    marker.updatedAt = at;
  }

  async markFailed(reference: string, reason: string, at: Date): Promise<void> {
    const marker = this.store.processedPayments.get(reference);
    if (!marker) return;
    marker.status = "failed";
    marker.failureReason = reason;
    marker.updatedAt = at;
  }
}
