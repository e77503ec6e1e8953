// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/entitlements/rules`
 * Purpose: Pure rules for credit cost per mode, daily cache limits and UTC day boundaries.
 * Scope: Pure functions. Does not touch counters or balances.
 * Invariants: Mode cost is a small positive integer; a resolved limit of null means unlimited.
 * Side-effects: none
 * @public
 */

import type { InteractionMode } from "./model";

export const MODE_CREDIT_COST: Readonly<Record<InteractionMode, number>> = {
  text: 1,
  voice: 2,
};

export function creditCostForMode(mode: InteractionMode): number {
  return MODE_CREDIT_COST[mode];
}

/**
 * Effective daily cache limit.
 * Plan value wins over the deployment default; any value <= 0 means unlimited (null).
 */
export function resolveDailyCacheLimit(
  planLimit: number | null,
  defaultLimit: number
): number | null {
  const limit = planLimit ?? defaultLimit;
  return limit > 0 ? limit : null;
}

/** Calendar day key (YYYY-MM-DD) in UTC */
export function utcDayKey(now: Date): string {
  return now.toISOString().slice(0, 10);
}

export function nextUtcMidnight(now: Date): Date {
  return new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1)
  );
}

/**
 * Human-facing message for a denial; never includes internal detail.
 */
export function denialMessage(
  reason: "subscription_required" | "cache_limit_reached" | "no_credits"
): string {
  switch (reason) {
    case "subscription_required":
      return "Your plan is not active. Please renew your plan to keep asking questions.";
    case "cache_limit_reached":
      return "You have reached today's answer limit. Your quota resets tomorrow.";
    case "no_credits":
      return "You have used all your AI credits for this plan period. Please renew or upgrade your plan.";
  }
}
