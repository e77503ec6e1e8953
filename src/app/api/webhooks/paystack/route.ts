// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/webhooks/paystack`
 * Purpose: Payment provider notification endpoint.
 * Scope: Reads the raw body and signature header, delegates to the facade. Does not parse JSON before the signature is checked.
 * Invariants: The signature is checked over the raw body bytes, before any text decoding; 401 only for a bad signature; 500 (via wrapper) makes the provider redeliver.
 * Side-effects: IO (via facade)
 * Links: contracts/payments.paystack-webhook.v1.contract.ts, app/_facades/payments/paystack.server.ts
 * @public
 */

import { NextResponse } from "next/server";

import { paystackWebhookFacade } from "@/app/_facades/payments/paystack.server";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import {
  PAYSTACK_SIGNATURE_HEADER,
  paystackWebhookOperation,
} from "@/contracts/payments.paystack-webhook.v1.contract";

export const runtime = "nodejs";

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "payments.paystack_webhook" },
  async (ctx, request) => {
    const rawBody = Buffer.from(await request.arrayBuffer());
    const signature = request.headers.get(PAYSTACK_SIGNATURE_HEADER);

    const reply = await paystackWebhookFacade({ rawBody, signature }, ctx);
    return NextResponse.json(paystackWebhookOperation.output.parse(reply.body), {
      status: reply.status,
    });
  }
);
