// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/subscriptions/schedule`
 * Purpose: HTTP endpoint for scheduling a plan change at the end of the current period.
 * Scope: Validates the body, delegates to the facade, maps domain errors.
 * Invariants: 404 for an unknown plan; 409 when nothing current grants access.
 * Side-effects: IO (via facade)
 * Links: contracts/subscriptions.schedule.v1.contract.ts
 * @public
 */

import { NextResponse } from "next/server";

import { schedulePlanChangeFacade } from "@/app/_facades/subscriptions/subscriptions.server";
import {
  handleSubscriptionRouteError,
  invalidJsonResponse,
} from "@/app/_lib/http/subscriptionErrors";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { subscriptionsScheduleOperation } from "@/contracts/subscriptions.schedule.v1.contract";

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "subscriptions.schedule" },
  async (ctx, request) => {
    try {
      let body: unknown;
      try {
        body = await request.json();
      } catch {
        return invalidJsonResponse();
      }

      const input = subscriptionsScheduleOperation.input.parse(body);
      const result = await schedulePlanChangeFacade(input, ctx);
      return NextResponse.json(subscriptionsScheduleOperation.output.parse(result));
    } catch (error) {
      const errorResponse = handleSubscriptionRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error; // Unhandled - let wrapper catch
    }
  }
);
