// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/payments/paystack.server`
 * Purpose: App-layer wiring for payment provider notifications. Resolves dependencies, delegates to payment fulfillment, maps results to the webhook DTO.
 * Scope: Server-only facade. Returns the HTTP status alongside the body; does not read the request.
 * Invariants: Only a bad signature answers 401; every handled, ignored or replayed delivery answers 200.
 *   A replay carries the account's current state, active flag and expiry.
 * Side-effects: IO (via payment and subscription ports)
 * Notes: Provider and store failures bubble to the route wrapper (500) so the provider redelivers.
 * Links: contracts/payments.paystack-webhook.v1.contract.ts, features/payments/services/handlePaymentNotification.ts
 * @public
 */

import { resolvePaymentDeps } from "@/bootstrap/container";
import type { PaystackWebhookOutput } from "@/contracts/payments.paystack-webhook.v1.contract";
import {
  handlePaymentNotification,
  type PaymentNotificationInput,
  type PaymentNotificationResult,
} from "@/features/payments/public";
import type { RequestContext } from "@/shared/observability";

export interface PaystackWebhookReply {
  status: 200 | 401;
  body: PaystackWebhookOutput;
}

export async function paystackWebhookFacade(
  params: PaymentNotificationInput,
  ctx: RequestContext
): Promise<PaystackWebhookReply> {
  const result = await handlePaymentNotification(
    resolvePaymentDeps(),
    params,
    ctx
  );
  return toWebhookReply(result);
}

function toWebhookReply(
  result: PaymentNotificationResult
): PaystackWebhookReply {
  if (!result.ok) {
    return { status: 401, body: { ok: false, reason: result.reason } };
  }
  if ("ignored" in result) {
    return { status: 200, body: { ok: true, ignored: result.ignored } };
  }
  if ("idempotent" in result) {
    return {
      status: 200,
      body: {
        ok: true,
        idempotent: true,
        activated: false,
        payment_status: result.payment,
        ...(result.subscription && {
          state: result.subscription.state,
          active: result.subscription.active,
          expires_at: result.subscription.expiresAt?.toISOString() ?? null,
        }),
      },
    };
  }
  if (result.activated) {
    return {
      status: 200,
      body: { ok: true, activated: true, scheduled: result.scheduled },
    };
  }
  return {
    status: 200,
    body: { ok: true, activated: false, reason: result.reason },
  };
}
