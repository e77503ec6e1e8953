// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/api/metrics`
 * Purpose: Prometheus metrics endpoint for scraping.
 * Scope: Exposes metrics registry. Protected by bearer token auth. Does not define or record metrics.
 * Invariants: METRICS_TOKEN required; constant-time compare; auth header capped at 512 bytes.
 * Side-effects: IO (reads metrics registry, records HTTP metrics)
 * Notes: Bearer token auth case-insensitive. Wrapped for consistent reqId and HTTP metrics.
 * @public
 */

import { NextResponse } from "next/server";

import { wrapRouteHandlerWithLogging } from "@/bootstrap/http";
import { serverEnv } from "@/shared/env";
import { metricsRegistry } from "@/shared/observability";
import { extractBearerToken, safeCompare } from "@/shared/util";

export const dynamic = "force-dynamic";

export const GET = wrapRouteHandlerWithLogging(
  { routeId: "meta.metrics" },
  async (_ctx, request) => {
    const configuredToken = serverEnv().METRICS_TOKEN;

    if (!configuredToken) {
      return NextResponse.json(
        { error: "METRICS_TOKEN not configured" },
        { status: 500 }
      );
    }

    const providedToken = extractBearerToken(
      request.headers.get("authorization")
    );
    if (!providedToken || !safeCompare(providedToken, configuredToken)) {
      return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
    }

    const metrics = await metricsRegistry.metrics();
    return new NextResponse(metrics, {
      headers: {
        "Content-Type": metricsRegistry.contentType,
        "Cache-Control": "no-store",
      },
    });
  }
);
