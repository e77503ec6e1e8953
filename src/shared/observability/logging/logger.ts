// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Pino logger factory for the HTTP service, batch jobs and provider adapters.
 * Scope: Build configured pino loggers writing JSON to stdout. Does not bind request fields (see context/factory).
 * Invariants: JSON lines on fd 1 only; secrets and payment PII redacted; silent under Vitest and NODE_ENV=test.
 * Side-effects: none
 * Notes: Reads NODE_ENV, PINO_LOG_LEVEL, SERVICE_NAME and DEPLOY_ENVIRONMENT directly so module-scope loggers never trigger serverEnv() validation.
 *        Pretty output is a pipe concern (pino-pretty), not configured here.
 * Links: ./redact.ts; used by container, adapters and src/scripts/*.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const silent = process.env.VITEST === "true" || nodeEnv === "test";

  return pino(
    {
      level: process.env.PINO_LOG_LEVEL ?? "info",
      enabled: !silent,
      // Reserved keys last so bindings cannot overwrite them
      base: {
        ...bindings,
        app: "taxdesk",
        service: process.env.SERVICE_NAME ?? "taxdesk",
        env: process.env.DEPLOY_ENVIRONMENT ?? "local",
      },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    // Sync outside production so a crashing job still flushes its last lines
    pino.destination({ dest: 1, sync: nodeEnv !== "production", minLength: 4096 })
  );
}

/** Disabled pino instance for unit tests; keeps the Logger type */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
