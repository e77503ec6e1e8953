// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/subscriptions/status`
 * Purpose: HTTP endpoint for reading an account's derived subscription status.
 * Scope: Validates the account_id query parameter, delegates to the facade. Does not derive state itself.
 * Invariants: A due scheduled change is applied before the status is read.
 * Side-effects: IO (via facade)
 * Links: contracts/subscriptions.status.v1.contract.ts
 * @public
 */

import { NextResponse } from "next/server";

import { getSubscriptionStatusFacade } from "@/app/_facades/subscriptions/subscriptions.server";
import { handleSubscriptionRouteError } from "@/app/_lib/http/subscriptionErrors";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { subscriptionsStatusOperation } from "@/contracts/subscriptions.status.v1.contract";

export const dynamic = "force-dynamic";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "subscriptions.status" },
  async (ctx, request) => {
    try {
      const url = new URL(request.url);
      const input = subscriptionsStatusOperation.input.parse({
        account_id: url.searchParams.get("account_id") ?? undefined,
      });
      const result = await getSubscriptionStatusFacade(input.account_id, ctx);
      return NextResponse.json(subscriptionsStatusOperation.output.parse(result));
    } catch (error) {
      const errorResponse = handleSubscriptionRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error; // Unhandled - let wrapper catch
    }
  }
);
