// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/payments/services/paystackEvent`
 * Purpose: Minimal shape of a provider webhook event that fulfillment relies on.
 * Scope: Zod parsing of the signed body. Only the event name and reference are trusted, and the reference only as a lookup key.
 * Invariants: Unknown fields pass through untouched; amounts and metadata come from the provider lookup, never from this body.
 * Side-effects: none
 * @internal
 */

import { z } from "zod";

export const paymentEventSchema = z.object({
  event: z.string().min(1),
  data: z
    .object({
      reference: z.string().trim().min(1),
      status: z.string().optional(),
    })
    .passthrough(),
});

export type PaymentEvent = z.infer<typeof paymentEventSchema>;

/** null when the body is not JSON or lacks the fields above */
export function parsePaymentEvent(rawBody: string): PaymentEvent | null {
  let json: unknown;
  try {
    json = JSON.parse(rawBody);
  } catch {
    return null;
  }
  const parsed = paymentEventSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
