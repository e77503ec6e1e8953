// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema.credits`
 * Purpose: AI credit balances and daily cache-serve counters.
 * Scope: Defines credit_balances and daily_usage. Does not include subscription records.
 * Invariants:
 * - At most one credit_balances row per account; balance never negative (CHECK).
 * - daily_usage unique on (account_id, day); day is a UTC calendar date.
 * Side-effects: none (schema definitions only)
 * @public
 */

import { sql } from "drizzle-orm";
import {
  check,
  date,
  integer,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
} from "drizzle-orm/pg-core";

export const creditBalances = pgTable(
  "credit_balances",
  {
    accountId: text("account_id").primaryKey(),
    balance: integer("balance").notNull().default(0),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    nonNegative: check("credit_balances_non_negative", sql`${table.balance} >= 0`),
  })
);

export const dailyUsage = pgTable(
  "daily_usage",
  {
    accountId: text("account_id").notNull(),
    day: date("day", { mode: "string" }).notNull(),
    cacheCount: integer("cache_count").notNull().default(0),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    accountDayUnique: uniqueIndex("daily_usage_account_day_unique").on(
      table.accountId,
      table.day
    ),
  })
);
