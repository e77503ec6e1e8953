// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context/types`
 * Purpose: Context passed from routes and jobs into facades and feature services.
 * Scope: RequestContext shape only. Does not create contexts.
 * Invariants: log is a child logger already bound to reqId; clock is the single time source for a request or job run.
 * Side-effects: none
 * @public
 */

import type { Logger } from "pino";

/** Structural twin of ports/Clock so shared/ never imports ports/ */
export interface Clock {
  now(): string;
}

export interface RequestContext {
  log: Logger;
  /** Correlation id: sanitized x-request-id, or a fresh UUID for jobs */
  reqId: string;
  /** Route id for requests, job id for batch runs */
  routeId: string;
  clock: Clock;
}
