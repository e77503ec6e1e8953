// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time abstraction for deterministic testing of period, grace and quota-day boundaries.
 * Scope: Provides current time in ISO format. Does not handle timezone conversion or date arithmetic.
 * Invariants: Always returns ISO 8601 string format (UTC)
 * Side-effects: none (interface only)
 * Notes: Features convert with `new Date(clock.now())` and pass Date into pure core rules.
 * Links: Implemented by SystemClock and adapters/test ManualClock
 * @public
 */

export interface Clock {
  /**
   * Get current time as ISO 8601 string
   */
  now(): string;
}
