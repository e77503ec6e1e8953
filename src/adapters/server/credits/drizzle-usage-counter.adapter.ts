// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/credits/drizzle-usage-counter`
 * Purpose: Drizzle implementation of DailyUsageCounter over daily_usage.
 * Scope: Atomic check-and-increment of the per-day cache-serve count. Does not resolve limits.
 * Invariants: One statement: INSERT ... ON CONFLICT (account_id, day) DO UPDATE SET cache_count = cache_count + 1 WHERE cache_count < limit RETURNING.
 * Side-effects: IO (database operations)
 * Links: Implements DailyUsageCounter port
 * @public
 */

import { and, eq, lt, sql } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type { DailyUsageCounter, UsageAdmission } from "@/ports";
import { dailyUsage } from "@/shared/db";

export class DrizzleDailyUsageCounter implements DailyUsageCounter {
  constructor(private readonly db: Database) {}

  async tryIncrement(
    accountId: string,
    day: string,
    limit: number | null
  ): Promise<UsageAdmission> {
    if (limit !== null && limit <= 0) {
      return { admitted: false, count: await this.getCount(accountId, day) };
    }

    const now = new Date();
    const [row] = await this.db
      .insert(dailyUsage)
      .values({ accountId, day, cacheCount: 1, updatedAt: now })
      .onConflictDoUpdate({
        target: [dailyUsage.accountId, dailyUsage.day],
        set: {
          cacheCount: sql`${dailyUsage.cacheCount} + 1`,
          updatedAt: now,
        },
        ...(limit !== null && {
          setWhere: lt(dailyUsage.cacheCount, limit),
        }),
      })
      .returning({ cacheCount: dailyUsage.cacheCount });

    if (!row) {
      return { admitted: false, count: await this.getCount(accountId, day) };
    }
    return { admitted: true, count: row.cacheCount };
  }

  async getCount(accountId: string, day: string): Promise<number> {
    const [row] = await this.db
      .select({ cacheCount: dailyUsage.cacheCount })
      .from(dailyUsage)
      .where(and(eq(dailyUsage.accountId, accountId), eq(dailyUsage.day, day)))
      .limit(1);
    return row?.cacheCount ?? 0;
  }
}
