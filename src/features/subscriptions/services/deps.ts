// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/subscriptions/services/deps`
 * Purpose: Dependency bundle shared by subscription services.
 * Scope: Type only. Wired by the bootstrap container.
 * Side-effects: none
 * @public
 */

import type { PlanCatalog, SubscriptionRepository } from "@/ports";

export interface SubscriptionDeps {
  subscriptions: SubscriptionRepository;
  plans: PlanCatalog;
  /** Grace window after a lapsed past_due/cancelled period */
  graceWindowMs: number;
}
