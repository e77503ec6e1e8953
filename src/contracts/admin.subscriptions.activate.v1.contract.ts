// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/admin.subscriptions.activate.v1.contract`
 * Purpose: External API contract for operator-driven plan activation.
 * Scope: Edge IO definition with schema validation. Does not contain business logic.
 * Invariants: Contract remains stable; breaking changes require new version.
 * Side-effects: none
 * Notes: Admin-only endpoint (bearer ADMIN_API_TOKEN). Credits are overwritten with the plan's allowance.
 * Links: /api/admin/subscriptions/activate route
 * @internal
 */

import { z } from "zod";

import { subscriptionStatusSchema } from "./subscriptions.status.v1.contract";

export const adminSubscriptionsActivateOperation = {
  id: "admin.subscriptions.activate.v1",
  summary: "Activate plan (admin)",
  description:
    "Starts a new subscription period for an account, optionally with an explicit end date.",
  input: z.object({
    account_id: z.string().trim().min(1, "account_id required"),
    plan_code: z.string().trim().min(1, "plan_code required"),
    expires_at: z.string().datetime({ offset: true }).optional(),
  }),
  output: z.object({
    subscription: z.object({
      id: z.string(),
      plan_code: z.string(),
      status: z.string(),
      period_start: z.string(),
      period_end: z.string(),
      source: z.string(),
    }),
    status: subscriptionStatusSchema,
  }),
} as const;

export type AdminSubscriptionsActivateInput = z.infer<
  typeof adminSubscriptionsActivateOperation.input
>;
export type AdminSubscriptionsActivateOutput = z.infer<
  typeof adminSubscriptionsActivateOperation.output
>;
