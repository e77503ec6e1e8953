// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/server/metrics`
 * Purpose: Prometheus metrics registry and metric definitions for observability.
 * Scope: Shared observability singleton. Provides metrics registry and recording helpers. Does not implement HTTP transport or scrape endpoints.
 * Invariants: Single registry per process via globalThis; labels always low-cardinality (never account ids or questions).
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: Uses getOrCreate pattern to prevent duplicate registration errors during tests.
 * Links: Consumed by route wrapper and services; exposed via /api/metrics endpoint.
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

// Singleton via globalThis to survive test module reloads
const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({
    app: "taxdesk",
    // Module-level init runs before serverEnv() available
    env: process.env.DEPLOY_ENVIRONMENT ?? "local",
  });
  client.collectDefaultMetrics({ register: metricsRegistry });
}

// =============================================================================
// Metric Factory Helpers (prevent duplicate registration)
// =============================================================================

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[] = []
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames,
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames,
    buckets,
    registers: [metricsRegistry],
  });
}

// =============================================================================
// HTTP Metrics
// =============================================================================

export const httpRequestsTotal = getOrCreateCounter(
  "http_requests_total",
  "Total number of HTTP requests",
  ["route", "method", "status"] as const
);

export const httpRequestDurationMs = getOrCreateHistogram(
  "http_request_duration_ms",
  "HTTP request duration in milliseconds",
  ["route", "method"] as const,
  [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000]
);

// =============================================================================
// Ask Pipeline Metrics
// =============================================================================

/** outcome: hit | denied | generation_failed | not_found; source: library | cache | ai | none */
export const askOutcomesTotal = getOrCreateCounter(
  "ask_outcomes_total",
  "Ask requests by outcome and answer source",
  ["outcome", "source"] as const
);

export const creditRefundsTotal = getOrCreateCounter(
  "credit_refunds_total",
  "Credits returned after a failed generation",
  [] as const
);

export const answerGenerationDurationMs = getOrCreateHistogram(
  "answer_generation_duration_ms",
  "AI answer generation duration in milliseconds",
  ["result"] as const,
  [100, 500, 1000, 2500, 5000, 10000, 30000, 60000]
);

// =============================================================================
// Payment Metrics (alertable)
// =============================================================================

/** result: activated | scheduled | replay | ignored | rejected | invalid_signature | failed */
export const paymentNotificationsTotal = getOrCreateCounter(
  "payment_notifications_total",
  "Payment notifications by processing result",
  ["result"] as const
);

// =============================================================================
// Helpers
// =============================================================================

/**
 * Map HTTP status code to bucket for low-cardinality label.
 * Returns '2xx', '4xx', or '5xx'.
 */
export function statusBucket(status: number): "2xx" | "4xx" | "5xx" {
  if (status >= 200 && status < 300) return "2xx";
  if (status >= 400 && status < 500) return "4xx";
  return "5xx";
}
