// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/subscriptions.trial.v1.contract`
 * Purpose: External API contract for starting an account's one-time trial.
 * Scope: Edge IO definition with schema validation. Does not contain business logic.
 * Invariants: 409 when the account already has any subscription record.
 * Side-effects: none
 * Links: /api/v1/subscriptions/trial route
 * @internal
 */

import { z } from "zod";

import { subscriptionStatusSchema } from "./subscriptions.status.v1.contract";

export const subscriptionsTrialOperation = {
  id: "subscriptions.trial.v1",
  summary: "Start trial",
  description:
    "Activates the trial plan for an account that has never held a subscription.",
  input: z.object({
    account_id: z.string().trim().min(1, "account_id required"),
  }),
  output: subscriptionStatusSchema,
} as const;

export type SubscriptionsTrialInput = z.infer<
  typeof subscriptionsTrialOperation.input
>;
