// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema.payments`
 * Purpose: Idempotency markers for provider payment notifications.
 * Scope: Defines processed_payments. Does not store raw webhook bodies.
 * Invariants:
 * - reference is the primary key; one marker per provider transaction.
 * - status success is terminal; processing/failed may be re-claimed.
 * Side-effects: none (schema definitions only)
 * @public
 */

import { integer, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const processedPayments = pgTable("processed_payments", {
  reference: text("reference").primaryKey(),
  status: text("status", {
    enum: ["processing", "success", "failed"],
  }).notNull(),
  accountId: text("account_id"),
  planCode: text("plan_code"),
  /** Minor units as reported by the provider */
  amount: integer("amount"),
  currency: text("currency"),
  failureReason: text("failure_reason"),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});
