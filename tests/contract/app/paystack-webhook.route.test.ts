// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/contract/app/paystack-webhook.route`
 * Purpose: POST /api/webhooks/paystack through the APP_ENV=test container.
 * Scope: Raw body signature handling and HTTP status mapping. Does not start an HTTP server.
 * Invariants: Bad signatures answer 401; handled, ignored and replayed events answer 200; provider outages answer 5xx.
 *   The signature covers the raw body bytes.
 * Side-effects: none (in-memory store, fake verifier)
 * Links: src/app/api/webhooks/paystack/route.ts
 * @internal
 */

import { buildTransaction } from "@tests/_fakes";
import { NextRequest } from "next/server";
import { describe, expect, it } from "vitest";

import { getTestMemoryStore, getTestPaymentVerifier } from "@/adapters/test";
import { POST } from "@/app/api/webhooks/paystack/route";
import { PAYSTACK_SIGNATURE_HEADER } from "@/contracts/payments.paystack-webhook.v1.contract";
import { hmacSha512Hex } from "@/shared/util";

const BODY = JSON.stringify({
  event: "charge.success",
  data: { reference: "ref-1", status: "success" },
});

function webhook(body: BodyInit, signature: string | null): NextRequest {
  return new NextRequest("http://localhost/api/webhooks/paystack", {
    method: "POST",
    headers: signature ? { [PAYSTACK_SIGNATURE_HEADER]: signature } : {},
    body,
  });
}

describe("POST /api/webhooks/paystack", () => {
  it("answers 401 for a bad signature", async () => {
    const response = await POST(webhook(BODY, "0".repeat(128)));

    expect(response.status).toBe(401);
    expect(await response.json()).toEqual({ ok: false, reason: "invalid_signature" });
  });

  it("activates once and replays redeliveries with the current status", async () => {
    getTestPaymentVerifier().setTransaction(buildTransaction());
    const signature = hmacSha512Hex("test-secret", BODY);

    const first = await POST(webhook(BODY, signature));
    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({ ok: true, activated: true, scheduled: false });

    const second = await POST(webhook(BODY, signature));
    expect(second.status).toBe(200);
    expect(await second.json()).toEqual({
      ok: true,
      idempotent: true,
      activated: false,
      payment_status: "success",
      state: "active",
      active: true,
      expires_at: "2025-02-14T09:00:00.000Z",
    });
    expect(getTestMemoryStore().subscriptions).toHaveLength(1);
  });

  it("verifies the signature over raw bytes that are not valid UTF-8", async () => {
    getTestPaymentVerifier().setTransaction(buildTransaction());
    const bytes = Uint8Array.from([
      ...Buffer.from('{"event":"charge.success","data":{"reference":"ref-1","status":"success","note":"'),
      0xff,
      0xfe,
      ...Buffer.from('"}}'),
    ]);

    const response = await POST(webhook(bytes, hmacSha512Hex("test-secret", bytes)));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, activated: true, scheduled: false });
  });

  it("acknowledges unhandled events", async () => {
    const body = JSON.stringify({ event: "refund.processed", data: { reference: "ref-9" } });
    const response = await POST(webhook(body, hmacSha512Hex("test-secret", body)));

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, ignored: "event_not_handled" });
  });

  it("surfaces provider outages so the provider retries", async () => {
    getTestPaymentVerifier().setError(503);

    await expect(POST(webhook(BODY, hmacSha512Hex("test-secret", BODY)))).rejects.toThrow(
      "Fake provider failure"
    );
    expect(getTestMemoryStore().processedPayments.get("ref-1")?.status).toBe("failed");
  });
});
