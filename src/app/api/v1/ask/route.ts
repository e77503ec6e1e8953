// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/ask`
 * Purpose: HTTP endpoint for asking a tax question.
 * Scope: Parses and validates the body with the ask contract, delegates to the facade. Does not implement resolution or entitlement logic.
 * Invariants: 400 only for malformed input; every business outcome (answer or denial) is 200.
 * Side-effects: IO (via facade)
 * Links: contracts/ask.v1.contract.ts, app/_facades/ask/ask.server.ts
 * @public
 */

import { NextResponse } from "next/server";

import { askFacade } from "@/app/_facades/ask/ask.server";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import {
  type AskResponse,
  askOperation,
} from "@/contracts/ask.v1.contract";
import { logRequestWarn, type RequestContext } from "@/shared/observability";

function invalidRequest(message: string): NextResponse {
  const body: AskResponse = { ok: false, error: "invalid_request", message };
  return NextResponse.json(body, { status: 400 });
}

function handleRouteError(ctx: RequestContext, error: unknown): NextResponse | null {
  // Zod validation errors
  if (error && typeof error === "object" && "issues" in error) {
    logRequestWarn(ctx.log, error, "VALIDATION_ERROR");
    return invalidRequest("Invalid input format");
  }
  return null;
}

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "ask" },
  async (ctx, request) => {
    try {
      let body: unknown;
      try {
        body = await request.json();
      } catch {
        return invalidRequest("Invalid JSON body");
      }

      const input = askOperation.input.parse(body);
      const result = await askFacade(input, ctx);
      const status = result.error === "invalid_request" ? 400 : 200;
      return NextResponse.json(askOperation.output.parse(result), { status });
    } catch (error) {
      const errorResponse = handleRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error; // Unhandled - let wrapper catch
    }
  }
);
