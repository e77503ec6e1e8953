// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/subscriptions.status.v1.contract`
 * Purpose: External API contract for reading an account's derived subscription status.
 * Scope: Edge IO definition with schema validation; shared status DTO for the trial/schedule/activate contracts. Does not contain business logic.
 * Invariants: Dates are ISO-8601 strings or null; state is derived at read time.
 * Side-effects: none
 * Links: /api/v1/subscriptions/status route
 * @internal
 */

import { z } from "zod";

export const subscriptionStatusSchema = z.object({
  active: z.boolean(),
  state: z.enum(["trial", "active", "grace", "expired"]),
  reason: z.string(),
  plan_code: z.string().nullable(),
  expires_at: z.string().nullable(),
  grace_until: z.string().nullable(),
  pending: z
    .object({
      plan_code: z.string(),
      effective_at: z.string(),
    })
    .nullable(),
});

export const subscriptionsStatusOperation = {
  id: "subscriptions.status.v1",
  summary: "Subscription status",
  description:
    "Derived access state for an account. Applies a due scheduled plan change before answering.",
  input: z.object({
    account_id: z.string().trim().min(1, "account_id required"),
  }),
  output: subscriptionStatusSchema,
} as const;

export type SubscriptionStatusDto = z.infer<typeof subscriptionStatusSchema>;
export type SubscriptionsStatusInput = z.infer<
  typeof subscriptionsStatusOperation.input
>;
