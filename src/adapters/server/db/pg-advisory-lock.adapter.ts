// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/pg-advisory-lock`
 * Purpose: JobLock backed by PostgreSQL session advisory locks.
 * Scope: pg_try_advisory_lock / pg_advisory_unlock on a reserved connection. Does not block waiting for the lock.
 * Invariants: Lock and unlock run on the same pinned connection (session-scoped locks only release on their own session).
 * Side-effects: IO (database)
 * Links: ports/job-lock.port.ts, bootstrap/jobs
 * @internal
 */

import type { ExclusiveRun, JobLock } from "@/ports";

import type { Database } from "./drizzle.client";

export class PgAdvisoryJobLock implements JobLock {
  constructor(private readonly db: Database) {}

  async runExclusive<T>(
    name: string,
    fn: () => Promise<T>
  ): Promise<ExclusiveRun<T>> {
    const reservedConn = await this.db.$client.reserve();
    try {
      const [lockRow] =
        await reservedConn`SELECT pg_try_advisory_lock(hashtext(${name})) AS acquired`;
      if (lockRow?.acquired !== true) {
        return { acquired: false };
      }

      try {
        return { acquired: true, result: await fn() };
      } finally {
        await reservedConn`SELECT pg_advisory_unlock(hashtext(${name}))`;
      }
    } finally {
      reservedConn.release();
    }
  }
}
