// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes`
 * Purpose: Barrel for test fakes, builders and the in-memory feature harness.
 * Scope: Re-exports fake implementations for testing. Does NOT export real implementations.
 * Invariants: No circular dependencies; named exports only.
 * Side-effects: none
 * Notes: Import fakes from here to replace I/O and time in unit tests.
 * Links: tests/setup.ts
 * @public
 */

export {
  buildCacheRow,
  buildLibraryRow,
  buildPlan,
  buildStoredAnswer,
  buildSubscription,
  buildTransaction,
} from "./builders";
export { FakeClock } from "./fake-clock";
export {
  type HarnessOptions,
  type MemoryHarness,
  makeMemoryHarness,
  TEST_WEBHOOK_SECRET,
} from "./memory-harness";
export { makeTestCtx, type TestCtxOptions } from "./test-context";
