// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/_lib/http/subscriptionErrors`
 * Purpose: Shared error-to-response mapping for subscription routes.
 * Scope: Maps zod issues and subscription domain errors to 4xx JSON; returns null for anything else. Does not log unhandled errors.
 * Invariants: Body shape matches contracts/error.v1.contract.ts.
 * Side-effects: IO (warn log on mapped errors)
 * Links: app/api/v1/subscriptions/*, app/api/admin/subscriptions/activate
 * @internal
 */

import { NextResponse } from "next/server";

import type { ErrorResponse } from "@/contracts/error.v1.contract";
import {
  isInvalidPeriodError,
  isNoCurrentSubscriptionError,
  isTrialNotEligibleError,
  isUnknownPlanError,
} from "@/core/subscriptions/public";
import { logRequestWarn, type RequestContext } from "@/shared/observability";

function errorJson(status: number, body: ErrorResponse): NextResponse {
  return NextResponse.json(body, { status });
}

export function invalidJsonResponse(): NextResponse {
  return errorJson(400, {
    error: "invalid_request",
    message: "Invalid JSON body",
  });
}

export function handleSubscriptionRouteError(
  ctx: RequestContext,
  error: unknown
): NextResponse | null {
  // Zod validation errors
  if (error && typeof error === "object" && "issues" in error) {
    logRequestWarn(ctx.log, error, "VALIDATION_ERROR");
    return errorJson(400, {
      error: "invalid_request",
      message: "Invalid input format",
    });
  }

  if (isUnknownPlanError(error)) {
    logRequestWarn(ctx.log, error, error.code);
    return errorJson(404, { error: "unknown_plan", message: error.message });
  }

  if (isTrialNotEligibleError(error)) {
    logRequestWarn(ctx.log, error, error.code);
    return errorJson(409, {
      error: "trial_not_eligible",
      message:
        "A trial is only available to accounts without a subscription history.",
    });
  }

  if (isNoCurrentSubscriptionError(error)) {
    logRequestWarn(ctx.log, error, error.code);
    return errorJson(409, {
      error: "no_current_subscription",
      message: error.message,
    });
  }

  if (isInvalidPeriodError(error)) {
    logRequestWarn(ctx.log, error, error.code);
    return errorJson(400, { error: "invalid_period", message: error.message });
  }

  return null;
}
