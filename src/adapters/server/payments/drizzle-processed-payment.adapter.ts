// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/payments/drizzle-processed-payment`
 * Purpose: Drizzle implementation of ProcessedPaymentRepository (webhook idempotency markers).
 * Scope: Marker lookup, atomic claim, terminal updates. Does not validate payments.
 * Invariants:
 * - claim() is one INSERT ... ON CONFLICT DO UPDATE ... WHERE status = failed OR stale processing; success is never re-claimed
 * - markSuccess() is only called after activation has committed
 * Side-effects: IO (database operations)
 * Links: Implements ProcessedPaymentRepository port
 * @public
 */

import { and, eq, lt, or } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type { ProcessedPayment } from "@/core/payments/public";
import type { PaymentSettlement, ProcessedPaymentRepository } from "@/ports";
import { processedPayments } from "@/shared/db";

type ProcessedPaymentRow = typeof processedPayments.$inferSelect;

export class DrizzleProcessedPaymentRepository
  implements ProcessedPaymentRepository
{
  constructor(private readonly db: Database) {}

  async find(reference: string): Promise<ProcessedPayment | null> {
    const [row] = await this.db
      .select()
      .from(processedPayments)
      .where(eq(processedPayments.reference, reference))
      .limit(1);
    return row ? this.mapRow(row) : null;
  }

  async claim(reference: string, now: Date, staleBefore: Date): Promise<boolean> {
    const rows = await this.db
      .insert(processedPayments)
      .values({
        reference,
        status: "processing",
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoUpdate({
        target: processedPayments.reference,
        set: { status: "processing", failureReason: null, updatedAt: now },
        setWhere: or(
          eq(processedPayments.status, "failed"),
          and(
            eq(processedPayments.status, "processing"),
            lt(processedPayments.updatedAt, staleBefore)
          )
        ),
      })
      .returning({ reference: processedPayments.reference });
    return rows.length > 0;
  }

  async markSuccess(
    reference: string,
    settlement: PaymentSettlement,
    at: Date
  ): Promise<void> {
    await this.db
      .update(processedPayments)
      .set({
        status: "success",
        accountId: settlement.accountId,
        planCode: settlement.planCode,
        amount: settlement.amount,
        currency: settlement.currency,
        failureReason: null,
        updatedAt: at,
      })
      .where(eq(processedPayments.reference, reference));
  }

  async markFailed(reference: string, reason: string, at: Date): Promise<void> {
    await this.db
      .update(processedPayments)
      .set({ status: "failed", failureReason: reason, updatedAt: at })
      .where(eq(processedPayments.reference, reference));
  }

  private mapRow(row: ProcessedPaymentRow): ProcessedPayment {
    return {
      reference: row.reference,
      status: row.status,
      accountId: row.accountId,
      planCode: row.planCode,
      amount: row.amount,
      currency: row.currency,
      failureReason: row.failureReason,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }
}
