// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/subscriptions.schedule.v1.contract`
 * Purpose: External API contract for scheduling a plan change at the end of the current period.
 * Scope: Edge IO definition with schema validation. Does not contain business logic.
 * Invariants: Replaces any earlier pending change; requires a current record that grants access.
 * Side-effects: none
 * Links: /api/v1/subscriptions/schedule route
 * @internal
 */

import { z } from "zod";

import { subscriptionStatusSchema } from "./subscriptions.status.v1.contract";

export const subscriptionsScheduleOperation = {
  id: "subscriptions.schedule.v1",
  summary: "Schedule plan change",
  description:
    "Records a pending plan change that takes effect when the current period ends.",
  input: z.object({
    account_id: z.string().trim().min(1, "account_id required"),
    plan_code: z.string().trim().min(1, "plan_code required"),
  }),
  output: subscriptionStatusSchema,
} as const;

export type SubscriptionsScheduleInput = z.infer<
  typeof subscriptionsScheduleOperation.input
>;
