// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/plan-catalog.port`
 * Purpose: Read-only plan lookup (duration, price, credit allotment, daily cache limit).
 * Scope: Interface only. Does not implement plan CRUD, which belongs to an external admin surface.
 * Invariants: Codes are matched case-insensitively; inactive plans are not returned by getPlan.
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzlePlanCatalog and InMemoryPlanCatalog
 * @public
 */

import type { Plan } from "@/core/subscriptions/public";

export interface PlanCatalog {
  getPlan(planCode: string): Promise<Plan | null>;
  listPlans(): Promise<Plan[]>;
}
