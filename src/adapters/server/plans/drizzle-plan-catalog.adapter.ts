// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/plans/drizzle-plan-catalog`
 * Purpose: PlanCatalog over the plans table with the built-in catalog as fallback.
 * Scope: Read-only plan lookup. Does not manage plans.
 * Invariants: A table row overrides the built-in plan with the same code; an inactive row hides the plan.
 * Side-effects: IO (database operations)
 * Links: Implements PlanCatalog port, core/subscriptions/data/plans.json
 * @public
 */

import { eq } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import {
  DEFAULT_PLANS,
  findDefaultPlan,
  normalizePlanCode,
  type Plan,
} from "@/core/subscriptions/public";
import type { PlanCatalog } from "@/ports";
import { plans } from "@/shared/db";

type PlanRow = typeof plans.$inferSelect;

export class DrizzlePlanCatalog implements PlanCatalog {
  constructor(private readonly db: Database) {}

  async getPlan(planCode: string): Promise<Plan | null> {
    const code = normalizePlanCode(planCode);
    const [row] = await this.db
      .select()
      .from(plans)
      .where(eq(plans.planCode, code))
      .limit(1);
    if (row) return row.active ? this.mapRow(row) : null;
    return findDefaultPlan(code);
  }

  async listPlans(): Promise<Plan[]> {
    const rows = await this.db.select().from(plans);
    const stored = new Map(rows.map((row) => [row.planCode, row]));
    const merged = DEFAULT_PLANS.filter((plan) => !stored.has(plan.planCode));
    return [
      ...merged,
      ...rows.filter((row) => row.active).map((row) => this.mapRow(row)),
    ];
  }

  private mapRow(row: PlanRow): Plan {
    return {
      planCode: row.planCode,
      name: row.name,
      price: row.price,
      currency: row.currency,
      durationDays: row.durationDays,
      aiCreditsTotal: row.aiCreditsTotal,
      dailyCacheLimit: row.dailyCacheLimit,
      active: row.active,
    };
  }
}
