// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/v1/subscriptions/trial`
 * Purpose: HTTP endpoint for starting an account's one-time trial.
 * Scope: Validates the body, delegates to the facade, maps domain errors. Does not check eligibility itself.
 * Invariants: 409 when the account already has subscription history.
 * Side-effects: IO (via facade)
 * Links: contracts/subscriptions.trial.v1.contract.ts
 * @public
 */

import { NextResponse } from "next/server";

import { startTrialFacade } from "@/app/_facades/subscriptions/subscriptions.server";
import {
  handleSubscriptionRouteError,
  invalidJsonResponse,
} from "@/app/_lib/http/subscriptionErrors";
import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { subscriptionsTrialOperation } from "@/contracts/subscriptions.trial.v1.contract";

export const POST = wrapRouteHandlerWithLogging(
  { routeId: "subscriptions.trial" },
  async (ctx, request) => {
    try {
      let body: unknown;
      try {
        body = await request.json();
      } catch {
        return invalidJsonResponse();
      }

      const input = subscriptionsTrialOperation.input.parse(body);
      const result = await startTrialFacade(input.account_id, ctx);
      return NextResponse.json(subscriptionsTrialOperation.output.parse(result));
    } catch (error) {
      const errorResponse = handleSubscriptionRouteError(ctx, error);
      if (errorResponse) return errorResponse;
      throw error; // Unhandled - let wrapper catch
    }
  }
);
