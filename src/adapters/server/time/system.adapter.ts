// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/time/system`
 * Purpose: Wall-clock Clock for production wiring.
 * Scope: Reads Date.now(). Does not cache or offset time.
 * Invariants: now() is ISO-8601 UTC; subscription periods, grace windows and usage days derive from it.
 * Side-effects: IO (reads system time)
 * Links: ports/clock.port.ts, adapters/test/time/manual-clock.adapter.ts
 * @internal
 */

import type { Clock } from "@/ports";

export class SystemClock implements Clock {
  now(): string {
    return new Date(Date.now()).toISOString();
  }
}
