// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/ask.v1.contract`
 * Purpose: External API contract for asking a tax question, with snake_case DTOs that isolate internal types.
 * Scope: Edge IO definition with schema validation. Does not contain business logic.
 * Invariants: Contract remains stable; breaking changes require new version. Business denials are 200 with ok=false.
 * Side-effects: none
 * Links: /api/v1/ask route, features/ask/services/askQuestion.ts
 * @internal
 */

import { z } from "zod";

export const ASK_ERROR_CODES = [
  "subscription_required",
  "cache_limit_reached",
  "no_credits",
  "generation_failed",
  "not_found",
  "invalid_request",
] as const;

export const askQuotaDetailsSchema = z.object({
  used: z.number().int(),
  limit: z.number().int(),
  resets_at: z.string(),
});

export const askCreditDetailsSchema = z.object({
  balance: z.number().int(),
  cost: z.number().int(),
});

export const askOperation = {
  id: "ask.v1",
  summary: "Ask a tax question",
  description:
    "Resolves a question from the curated Library, then the answer Cache, then generation. Denials (subscription, daily cache quota, credits) return ok=false with a machine-readable error.",
  input: z.object({
    account_id: z.string().trim().min(1, "account_id required"),
    question: z.string(),
    language: z.string().trim().min(1).optional(),
    mode: z.enum(["text", "voice"]).default("text"),
    channel: z.string().trim().min(1).max(64).optional(),
  }),
  output: z.object({
    ok: z.boolean(),
    answer: z.string().optional(),
    source: z.enum(["library", "cache", "ai"]).optional(),
    language: z.string().optional(),
    fallback_used: z.boolean().optional(),
    error: z.enum(ASK_ERROR_CODES).optional(),
    message: z.string().optional(),
    details: z
      .union([
        z.object({ quota: askQuotaDetailsSchema }),
        z.object({ credit: askCreditDetailsSchema }),
      ])
      .optional(),
  }),
} as const;

export type AskRequest = z.infer<typeof askOperation.input>;
export type AskResponse = z.infer<typeof askOperation.output>;
