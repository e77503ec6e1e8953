// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/job-lock.port`
 * Purpose: Single-writer guard for batch jobs.
 * Scope: Non-blocking named lock held for the duration of a callback. Does not queue or retry.
 * Invariants: At most one holder per name across processes; the lock is released when fn settles.
 * Side-effects: none (interface only)
 * Links: Implemented by PgAdvisoryJobLock and MemoryJobLock; used by bootstrap/jobs
 * @public
 */

export type ExclusiveRun<T> =
  | { acquired: true; result: T }
  | { acquired: false };

export interface JobLock {
  /** Run fn if no other holder has the lock; otherwise return acquired=false without running it. */
  runExclusive<T>(
    name: string,
    fn: () => Promise<T>
  ): Promise<ExclusiveRun<T>>;
}
