// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/factory`
 * Purpose: Factory for creating request-scoped context with sanitized reqId.
 * Scope: Create RequestContext with child logger; sanitize incoming x-request-id. Does not manage context lifecycle.
 * Invariants: reqId is validated (max 64 chars, alphanumeric + _-); routeId is stable identifier.
 * Side-effects: none
 * Links: Returns RequestContext type; called by route wrapper and job entry points.
 * @public
 */

import { randomUUID } from "node:crypto";

import type { Logger } from "pino";

import type { Clock, RequestContext } from "./types";

const REQUEST_ID_HEADER = "x-request-id";
const MAX_REQ_ID_LENGTH = 64;
const REQ_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Sanitize incoming x-request-id header to prevent injection attacks.
 * Max 64 chars, alphanumeric + _- only.
 */
export function sanitizeReqId(incoming: string | null): string {
  if (
    incoming &&
    incoming.length <= MAX_REQ_ID_LENGTH &&
    REQ_ID_PATTERN.test(incoming)
  ) {
    return incoming;
  }
  return randomUUID();
}

/**
 * Create request-scoped context with child logger.
 *
 * @param deps - Dependencies: baseLog (root logger), clock (time provider)
 * @returns RequestContext with child logger (reqId, route, method bound)
 */
export function createRequestContext(
  deps: { baseLog: Logger; clock: Clock },
  request: Request,
  meta: { routeId: string }
): RequestContext {
  const reqId = sanitizeReqId(request.headers.get(REQUEST_ID_HEADER));

  return {
    log: deps.baseLog.child({
      reqId,
      route: meta.routeId,
      method: request.method,
    }),
    reqId,
    routeId: meta.routeId,
    clock: deps.clock,
  };
}

/**
 * Context for work that has no inbound request (scheduled jobs, CLI runs).
 * A fresh run id stands in for reqId.
 */
export function createJobContext(
  deps: { baseLog: Logger; clock: Clock },
  meta: { jobId: string }
): RequestContext {
  const reqId = randomUUID();
  return {
    log: deps.baseLog.child({ reqId, job: meta.jobId }),
    reqId,
    routeId: meta.jobId,
    clock: deps.clock,
  };
}
