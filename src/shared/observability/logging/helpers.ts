// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/helpers`
 * Purpose: Standardized logging helpers to prevent log spam and drift.
 * Scope: Provide consistent request start/end logging. Does not handle domain-specific events.
 * Invariants: Same keys everywhere (route, reqId, method, status, durationMs).
 * Side-effects: IO (emits structured log entries via provided logger)
 * Notes: Used by wrapRouteHandlerWithLogging for every route.
 * @public
 */

import type { Logger } from "pino";

export function logRequestStart(log: Logger): void {
  log.info("request received");
}

/**
 * Log request end; level follows status (5xx error, 4xx warn, else info).
 *
 * @param log - Request-scoped child logger (with route, reqId, method already bound)
 */
export function logRequestEnd(
  log: Logger,
  meta: {
    status: number;
    durationMs: number;
  }
): void {
  const level =
    meta.status >= 500 ? "error" : meta.status >= 400 ? "warn" : "info";
  log[level](
    { status: meta.status, durationMs: meta.durationMs },
    "request complete"
  );
}

/**
 * Log error with consistent fields: err, errorCode.
 */
export function logRequestError(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.error({ err: error, errorCode }, "request failed");
}

/**
 * Log a client-caused rejection (validation, auth) at warn with the same fields as logRequestError.
 */
export function logRequestWarn(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.warn({ err: error, errorCode }, "request rejected");
}
