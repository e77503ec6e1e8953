// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/usage-counter.port`
 * Purpose: Daily cache-served answer counter with atomic check-and-increment.
 * Scope: Interface only. One row per (account, UTC day); never read across days.
 * Invariants: EXACTLY_ONCE_ADMISSION: tryIncrement is one store operation; concurrent callers never exceed the limit.
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzleDailyUsageCounter and InMemoryDailyUsageCounter
 * @public
 */

export type UsageAdmission =
  | { admitted: true; count: number }
  | { admitted: false; count: number };

export interface DailyUsageCounter {
  /**
   * Increment today's count if it is below `limit` (null = unlimited, always increments).
   * `count` is the value after a successful increment, or the current value on refusal.
   */
  tryIncrement(
    accountId: string,
    day: string,
    limit: number | null
  ): Promise<UsageAdmission>;

  getCount(accountId: string, day: string): Promise<number>;
}
