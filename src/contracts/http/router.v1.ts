// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/http/router.v1`
 * Purpose: ts-rest HTTP contract router for API v1 endpoints.
 * Scope: Defines HTTP-specific contracts (method, path, status codes). Does not include protocol-neutral operations.
 * Invariants: All routes map to protocol-neutral operations; HTTP methods and paths stable; paths match the src/app route directories.
 * Side-effects: none
 * Notes: Used by OpenAPI generation.
 * Links: Protocol-neutral operations, OpenAPI generator
 * @internal
 */

import { initContract } from "@ts-rest/core";
import { z } from "zod";

import { adminSubscriptionsActivateOperation } from "@/contracts/admin.subscriptions.activate.v1.contract";
import { askOperation } from "@/contracts/ask.v1.contract";
import { errorResponseSchema } from "@/contracts/error.v1.contract";
import { metaLivezOutputSchema } from "@/contracts/meta.livez.read.v1.contract";
import { paystackWebhookOperation } from "@/contracts/payments.paystack-webhook.v1.contract";
import { subscriptionsScheduleOperation } from "@/contracts/subscriptions.schedule.v1.contract";
import { subscriptionsStatusOperation } from "@/contracts/subscriptions.status.v1.contract";
import { subscriptionsTrialOperation } from "@/contracts/subscriptions.trial.v1.contract";

const c = initContract();

export const ApiContractV1 = c.router({
  ask: {
    method: "POST",
    path: "/api/v1/ask",
    summary: askOperation.summary,
    description: askOperation.description,
    body: askOperation.input,
    responses: {
      200: askOperation.output,
      400: askOperation.output,
    },
  },
  subscriptionStatus: {
    method: "GET",
    path: "/api/v1/subscriptions/status",
    summary: subscriptionsStatusOperation.summary,
    description: subscriptionsStatusOperation.description,
    query: subscriptionsStatusOperation.input,
    responses: {
      200: subscriptionsStatusOperation.output,
      400: errorResponseSchema,
    },
  },
  startTrial: {
    method: "POST",
    path: "/api/v1/subscriptions/trial",
    summary: subscriptionsTrialOperation.summary,
    description: subscriptionsTrialOperation.description,
    body: subscriptionsTrialOperation.input,
    responses: {
      200: subscriptionsTrialOperation.output,
      400: errorResponseSchema,
      409: errorResponseSchema,
    },
  },
  schedulePlanChange: {
    method: "POST",
    path: "/api/v1/subscriptions/schedule",
    summary: subscriptionsScheduleOperation.summary,
    description: subscriptionsScheduleOperation.description,
    body: subscriptionsScheduleOperation.input,
    responses: {
      200: subscriptionsScheduleOperation.output,
      400: errorResponseSchema,
      404: errorResponseSchema,
      409: errorResponseSchema,
    },
  },
  adminActivate: {
    method: "POST",
    path: "/api/admin/subscriptions/activate",
    summary: adminSubscriptionsActivateOperation.summary,
    description: adminSubscriptionsActivateOperation.description,
    headers: z.object({ authorization: z.string() }),
    body: adminSubscriptionsActivateOperation.input,
    responses: {
      200: adminSubscriptionsActivateOperation.output,
      400: errorResponseSchema,
      401: errorResponseSchema,
      404: errorResponseSchema,
    },
  },
  paystackWebhook: {
    method: "POST",
    path: "/api/webhooks/paystack",
    summary: paystackWebhookOperation.summary,
    description: paystackWebhookOperation.description,
    body: c.type<unknown>(),
    responses: {
      200: paystackWebhookOperation.output,
      401: paystackWebhookOperation.output,
    },
  },
  metaLivez: {
    method: "GET",
    path: "/livez",
    summary: "Liveness probe - process alive",
    description:
      "Fast liveness check confirming the process is alive and can handle requests. No dependency checks. HTTP status: 200 = alive, 5xx = not alive.",
    responses: {
      200: metaLivezOutputSchema,
    },
  },
});
