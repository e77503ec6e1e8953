// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/payments/paystack-verifier`
 * Purpose: Unit tests for transaction verification against the payment provider with mocked HTTP calls.
 * Scope: Request shape, response mapping, not-found and error handling. Does NOT call the real provider.
 * Invariants: Unknown transactions resolve to null; outages and malformed bodies throw PaymentProviderError.
 * Side-effects: none (mocked fetch)
 * Links: src/adapters/server/payments/paystack-verifier.adapter.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PaystackPaymentVerifier } from "@/adapters/server";
import { PaymentProviderError } from "@/ports";

const config = { baseUrl: "https://paystack.test", secretKey: "test-secret" };
const signal = new AbortController().signal;

function jsonResponse(status: number, body: unknown) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
  };
}

describe("adapters/server/payments/PaystackPaymentVerifier", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("maps a verified transaction", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(200, {
        status: true,
        message: "Verification successful",
        data: {
          id: 1,
          reference: "ref/1",
          status: "success",
          amount: 300000,
          currency: "NGN",
          paid_at: "2025-01-15T08:59:00.000Z",
          metadata: { account_id: "acct-1", plan_code: "monthly" },
        },
      })
    );

    const transaction = await new PaystackPaymentVerifier(config).verifyTransaction(
      "ref/1",
      signal
    );

    expect(transaction).toEqual({
      reference: "ref/1",
      status: "success",
      amount: 300000,
      currency: "NGN",
      paidAt: new Date("2025-01-15T08:59:00.000Z"),
      metadata: { account_id: "acct-1", plan_code: "monthly" },
    });
    expect(mockFetch).toHaveBeenCalledWith(
      "https://paystack.test/transaction/verify/ref%2F1",
      {
        method: "GET",
        headers: {
          Authorization: "Bearer test-secret",
          Accept: "application/json",
        },
        signal,
      }
    );
  });

  it("fills missing optional fields with null", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(200, {
        status: true,
        data: { reference: "ref-1", status: "abandoned", amount: 0, currency: "NGN" },
      })
    );

    const transaction = await new PaystackPaymentVerifier(config).verifyTransaction(
      "ref-1",
      signal
    );

    expect(transaction?.paidAt).toBeNull();
    expect(transaction?.metadata).toBeNull();
  });

  it("returns null for 404 and for status false", async () => {
    const verifier = new PaystackPaymentVerifier(config);

    mockFetch.mockResolvedValueOnce(jsonResponse(404, { status: false }));
    expect(await verifier.verifyTransaction("ref-1", signal)).toBeNull();

    mockFetch.mockResolvedValueOnce(
      jsonResponse(200, { status: false, message: "Transaction reference not found" })
    );
    expect(await verifier.verifyTransaction("ref-1", signal)).toBeNull();
  });

  it("throws on provider errors with the status", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(502, {}));

    const error = await new PaystackPaymentVerifier(config)
      .verifyTransaction("ref-1", signal)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PaymentProviderError);
    expect(error).toMatchObject({ status: 502, message: "Paystack verify error: 502" });
  });

  it("throws on network failures and timeouts", async () => {
    const verifier = new PaystackPaymentVerifier(config);

    mockFetch.mockRejectedValueOnce(Object.assign(new Error("t"), { name: "TimeoutError" }));
    await expect(verifier.verifyTransaction("ref-1", signal)).rejects.toThrow(
      "Paystack verify timed out"
    );

    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
    await expect(verifier.verifyTransaction("ref-1", signal)).rejects.toThrow(
      "Paystack network error: TypeError"
    );
  });

  it("throws on an unexpected body", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(200, { status: "yes" }));
    await expect(
      new PaystackPaymentVerifier(config).verifyTransaction("ref-1", signal)
    ).rejects.toThrow("Paystack verify returned an unexpected shape");
  });

  it("throws without calling out when no secret key is configured", async () => {
    await expect(
      new PaystackPaymentVerifier({ ...config, secretKey: undefined }).verifyTransaction(
        "ref-1",
        signal
      )
    ).rejects.toBeInstanceOf(PaymentProviderError);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
