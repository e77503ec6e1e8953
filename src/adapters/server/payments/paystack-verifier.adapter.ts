// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/payments/paystack-verifier`
 * Purpose: PaymentVerifier backed by Paystack's transaction verify endpoint.
 * Scope: GET /transaction/verify/:reference and mapping to VerifiedTransaction. Does not decide fulfillment.
 * Invariants:
 * - 404 or `status:false` → null (no such transaction)
 * - Transport errors, timeouts, 5xx and malformed bodies → PaymentProviderError
 * - Secret key is sent only as a bearer header and never logged
 * Side-effects: IO (HTTP calls to Paystack)
 * Links: PaymentVerifier port
 * @internal
 */

import { z } from "zod";

import type { VerifiedTransaction } from "@/core/payments/public";
import { PaymentProviderError, type PaymentVerifier } from "@/ports";
import { makeLogger } from "@/shared/observability";

const logger = makeLogger({ component: "PaystackVerifier" });

export interface PaystackConfig {
  baseUrl: string;
  secretKey: string | undefined;
}

const verifyResponseSchema = z.object({
  status: z.boolean(),
  message: z.string().optional(),
  data: z
    .object({
      reference: z.string(),
      status: z.string(),
      amount: z.number(),
      currency: z.string(),
      paid_at: z.string().nullable().optional(),
      metadata: z.unknown().optional(),
    })
    .nullable()
    .optional(),
});

function parsePaidAt(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export class PaystackPaymentVerifier implements PaymentVerifier {
  constructor(private readonly config: PaystackConfig) {}

  async verifyTransaction(
    reference: string,
    abortSignal: AbortSignal
  ): Promise<VerifiedTransaction | null> {
    if (!this.config.secretKey) {
      throw new PaymentProviderError(
        "Paystack secret key not configured",
        undefined
      );
    }

    let response: Response;
    try {
      response = await fetch(
        `${this.config.baseUrl}/transaction/verify/${encodeURIComponent(reference)}`,
        {
          method: "GET",
          headers: {
            Authorization: `Bearer ${this.config.secretKey}`,
            Accept: "application/json",
          },
          signal: abortSignal,
        }
      );
    } catch (error) {
      const errorName = error instanceof Error ? error.name : "unknown";
      const message =
        errorName === "TimeoutError"
          ? "Paystack verify timed out"
          : `Paystack network error: ${errorName}`;
      logger.warn({ reference, errorName }, message);
      throw new PaymentProviderError(message, undefined);
    }

    if (response.status === 404) return null;
    if (!response.ok) {
      logger.warn(
        { reference, status: response.status },
        "Paystack verify failed"
      );
      throw new PaymentProviderError(
        `Paystack verify error: ${response.status}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new PaymentProviderError(
        "Paystack verify returned invalid JSON",
        response.status
      );
    }

    const parsed = verifyResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new PaymentProviderError(
        "Paystack verify returned an unexpected shape",
        response.status
      );
    }
    if (!parsed.data.status || !parsed.data.data) return null;

    const data = parsed.data.data;
    return {
      reference: data.reference,
      status: data.status,
      amount: data.amount,
      currency: data.currency,
      paidAt: parsePaidAt(data.paid_at),
      metadata: data.metadata ?? null,
    };
  }
}
