// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/test/time/manual-clock`
 * Purpose: Settable Clock for APP_ENV=test so route-level tests can move time across period boundaries.
 * Scope: Returns a fixed instant until set or advanced. Does not tick on its own.
 * Side-effects: none
 * Links: Implements Clock port
 * @public
 */

import type { Clock } from "@/ports";

export const MANUAL_CLOCK_START = "2025-01-15T09:00:00.000Z";

export class ManualClock implements Clock {
  private current: number;

  constructor(initial: string = MANUAL_CLOCK_START) {
    this.current = Date.parse(initial);
  }

  now(): string {
    return new Date(this.current).toISOString();
  }

  set(iso: string): void {
    this.current = Date.parse(iso);
  }

  advanceMs(ms: number): void {
    this.current += ms;
  }

  reset(): void {
    this.current = Date.parse(MANUAL_CLOCK_START);
  }
}

let _testInstance: ManualClock | null = null;

export function getTestClock(): ManualClock {
  if (!_testInstance) {
    _testInstance = new ManualClock();
  }
  return _testInstance;
}

export function resetTestClock(): void {
  if (_testInstance) {
    _testInstance.reset();
  }
}
