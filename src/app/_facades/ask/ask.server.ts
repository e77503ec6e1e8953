// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_facades/ask/ask.server`
 * Purpose: App-layer wiring for the ask pipeline. Resolves dependencies, delegates to the feature service, and maps results to contract DTOs.
 * Scope: Server-only facade. Maps camelCase results to the snake_case wire shape and Date fields to ISO strings; does not perform HTTP handling.
 * Invariants: Return types use z.infer; every business outcome maps to exactly one DTO.
 * Side-effects: IO (via ask feature ports)
 * Notes: Errors bubble to route handlers for HTTP mapping.
 * Links: contracts/ask.v1.contract.ts, features/ask/services/askQuestion.ts
 * @public
 */

import { resolveAskDeps } from "@/bootstrap/container";
import type { AskRequest, AskResponse } from "@/contracts/ask.v1.contract";
import { type AskResult, askQuestion } from "@/features/ask/public";
import type { RequestContext } from "@/shared/observability";

export async function askFacade(
  input: AskRequest,
  ctx: RequestContext
): Promise<AskResponse> {
  const result = await askQuestion(
    resolveAskDeps(),
    {
      accountId: input.account_id,
      question: input.question,
      language: input.language,
      mode: input.mode,
      channel: input.channel,
    },
    ctx
  );
  return toAskResponse(result);
}

export function toAskResponse(result: AskResult): AskResponse {
  if (result.ok) {
    return {
      ok: true,
      answer: result.answer,
      source: result.source,
      language: result.language,
      fallback_used: result.fallbackUsed,
    };
  }

  switch (result.error) {
    case "cache_limit_reached":
      return {
        ok: false,
        error: result.error,
        message: result.message,
        details: {
          quota: {
            used: result.quota.used,
            limit: result.quota.limit,
            resets_at: result.quota.resetsAt.toISOString(),
          },
        },
      };
    case "no_credits":
      return {
        ok: false,
        error: result.error,
        message: result.message,
        details: { credit: result.credit },
      };
    default:
      return { ok: false, error: result.error, message: result.message };
  }
}
