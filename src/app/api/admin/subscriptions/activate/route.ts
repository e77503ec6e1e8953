// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/admin/subscriptions/activate`
 * Purpose: Admin HTTP endpoint for activating a plan on an account.
 * Scope: Bearer-token auth, body validation, delegation to the facade. Does not compute periods or credits.
 * Invariants: ADMIN_API_TOKEN required; constant-time compare; nothing is parsed before auth passes.
 * Side-effects: IO (via facade)
 * Links: contracts/admin.subscriptions.activate.v1.contract.ts
 * @public
 */

import { NextResponse } from "next/server";

import { adminActivateFacade } from "@/app/_facades/subscriptions/subscriptions.server";
import {
  handleSubscriptionRouteError,
  invalidJsonResponse,
} from "@/app/_lib/http/subscriptionErrors";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { adminSubscriptionsActivateOperation } from "@/contracts/admin.subscriptions.activate.v1.contract";
import { serverEnv } from "@/shared/env";
import { extractBearerToken, safeCompare } from "@/shared/util";

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "admin.subscriptions.activate" },
  async (ctx, request) => {
    const configuredToken = serverEnv().ADMIN_API_TOKEN;
    if (!configuredToken) {
      return NextResponse.json(
        { error: "ADMIN_API_TOKEN not configured" },
        { status: 500 }
      );
    }

    const providedToken = extractBearerToken(
      request.headers.get("authorization")
    );
    if (!providedToken || !safeCompare(providedToken, configuredToken)) {
      return NextResponse.json(
        { error: "Admin authentication required" },
        { status: 401 }
      );
    }

    try {
      let body: unknown;
      try {
        body = await request.json();
      } catch {
        return invalidJsonResponse();
      }

      const input = adminSubscriptionsActivateOperation.input.parse(body);
      const result = await adminActivateFacade(input, ctx);
      return NextResponse.json(
        adminSubscriptionsActivateOperation.output.parse(result)
      );
    } catch (error) {
      const errorResponse = handleSubscriptionRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error; // Unhandled - let wrapper catch
    }
  }
);
