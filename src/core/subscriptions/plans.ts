// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/subscriptions/plans`
 * Purpose: Built-in plan catalog used when the plans table has no row for a code.
 * Scope: Static data lookup. Does not read the database.
 * Invariants: Plan codes are unique and lowercase.
 * Side-effects: none
 * Links: data/plans.json, adapters/server/plans
 * @public
 */

import planRows from "./data/plans.json";
import type { Plan } from "./model";

export const TRIAL_PLAN_CODE = "trial";
export const MANUAL_PLAN_CODE = "manual";

export const DEFAULT_PLANS: readonly Plan[] = planRows.map((row) => ({
  planCode: row.planCode,
  name: row.name,
  price: row.price,
  currency: row.currency,
  durationDays: row.durationDays,
  aiCreditsTotal: row.aiCreditsTotal,
  dailyCacheLimit: row.dailyCacheLimit,
  active: row.active,
}));

export function normalizePlanCode(code: string): string {
  return code.trim().toLowerCase();
}

export function findDefaultPlan(code: string): Plan | null {
  const wanted = normalizePlanCode(code);
  return DEFAULT_PLANS.find((plan) => plan.planCode === wanted) ?? null;
}
