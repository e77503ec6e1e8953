// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/payments.paystack-webhook.v1.contract`
 * Purpose: Response contract for the payment provider notification endpoint.
 * Scope: Output schema only; the request body is raw JSON authenticated by the x-paystack-signature header.
 * Invariants: Handled, ignored and replayed deliveries all return 200 so the provider stops retrying.
 * Side-effects: none
 * Links: /api/webhooks/paystack route, features/payments/services/handlePaymentNotification.ts
 * @internal
 */

import { z } from "zod";

export const PAYSTACK_SIGNATURE_HEADER = "x-paystack-signature";

export const paystackWebhookOperation = {
  id: "payments.paystack-webhook.v1",
  summary: "Payment provider notification",
  description:
    "Signed charge notifications. Each provider reference activates (or schedules) at most one subscription change.",
  input: null,
  output: z.object({
    ok: z.boolean(),
    idempotent: z.boolean().optional(),
    activated: z.boolean().optional(),
    scheduled: z.boolean().optional(),
    ignored: z.string().optional(),
    reason: z.string().optional(),
    payment_status: z.enum(["processing", "success", "failed"]).optional(),
    state: z.enum(["trial", "active", "grace", "expired"]).optional(),
    active: z.boolean().optional(),
    expires_at: z.string().nullable().optional(),
  }),
} as const;

export type PaystackWebhookOutput = z.infer<
  typeof paystackWebhookOperation.output
>;
