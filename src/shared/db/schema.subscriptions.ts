// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema.subscriptions`
 * Purpose: Plan catalog and subscription record tables.
 * Scope: Defines plans and subscriptions. Does not include credit or usage tables.
 * Invariants:
 * - subscriptions rows are appended on activation; only status and pending_* columns change afterwards.
 * - The current record per account is the latest period_end (ties: latest created_at).
 * - plans.price is in the currency's major unit.
 * - At most one source='trial' record per account (ONE_TRIAL_PER_LIFETIME).
 * Side-effects: none (schema definitions only)
 * @public
 */

import { sql } from "drizzle-orm";
import {
  boolean,
  index,
  integer,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";

export const ONE_TRIAL_INDEX = "subscriptions_one_trial_per_account";

export const plans = pgTable("plans", {
  planCode: text("plan_code").primaryKey(),
  name: text("name").notNull(),
  price: integer("price").notNull().default(0),
  currency: text("currency").notNull().default("NGN"),
  durationDays: integer("duration_days").notNull(),
  aiCreditsTotal: integer("ai_credits_total").notNull().default(0),
  /** null = deployment default; <= 0 = unlimited */
  dailyCacheLimit: integer("daily_cache_limit"),
  active: boolean("active").notNull().default(true),
  createdAt: timestamp("created_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const subscriptions = pgTable(
  "subscriptions",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    accountId: text("account_id").notNull(),
    planCode: text("plan_code").notNull(),
    status: text("status", {
      enum: ["trial", "active", "past_due", "cancelled", "expired"],
    }).notNull(),
    periodStart: timestamp("period_start", { withTimezone: true }).notNull(),
    periodEnd: timestamp("period_end", { withTimezone: true }).notNull(),
    pendingPlanCode: text("pending_plan_code"),
    pendingEffectiveAt: timestamp("pending_effective_at", {
      withTimezone: true,
    }),
    source: text("source", {
      enum: ["trial", "payment", "admin", "scheduled"],
    }).notNull(),
    providerReference: text("provider_reference"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    accountPeriodIdx: index("subscriptions_account_period_idx").on(
      table.accountId,
      table.periodEnd
    ),
    pendingIdx: index("subscriptions_pending_effective_idx").on(
      table.pendingEffectiveAt
    ),
    oneTrialIdx: uniqueIndex(ONE_TRIAL_INDEX)
      .on(table.accountId)
      .where(sql`${table.source} = 'trial'`),
  })
);
