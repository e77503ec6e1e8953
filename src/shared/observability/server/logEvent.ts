// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/logEvent`
 * Purpose: Structured domain event logging against the EVENT_NAMES registry.
 * Scope: One info line per event with base fields. Does not create loggers or record metrics.
 * Invariants: Event names come from the registry; reqId is required (throws under Vitest, logs an invariant line otherwise).
 * Side-effects: IO (logging)
 * Links: events/index.ts; called by ask, subscription, payment and translation services.
 * @public
 */

import type { Logger } from "pino";
import type { EventBase, EventName } from "../events";

export function logEvent(
  logger: Logger,
  eventName: EventName,
  fields: EventBase & Record<string, unknown>,
  message: string = eventName
): void {
  if (!fields.reqId) {
    if (process.env.VITEST === "true") {
      throw new Error(`logEvent("${eventName}") called without reqId`);
    }
    logger.error(
      { event: eventName, missingField: "reqId" },
      "inv_missing_reqId_in_logEvent"
    );
    return;
  }

  logger.info({ event: eventName, ...fields }, message);
}
