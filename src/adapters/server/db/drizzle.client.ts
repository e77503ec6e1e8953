// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/db/drizzle.client`
 * Purpose: Drizzle database client configuration and connection management.
 * Scope: Database connection setup and Drizzle ORM instance. Does not handle business logic or migrations.
 * Invariants: Single database connection instance; properly configured with schema; lazy initialization
 * Side-effects: IO (database connections) - only on first access
 * Notes: Uses postgres driver with Drizzle ORM; lazy loading keeps module import free of env access.
 * Links: Used by database adapters for queries
 * @internal
 */

import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

import * as schema from "@/shared/db";
import { serverEnv } from "@/shared/env";

// Schema-aware database type
export type Database = PostgresJsDatabase<typeof schema> & {
  $client: ReturnType<typeof postgres>;
};

/** Transaction handle passed to `db.transaction` callbacks */
export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

// Lazy database connection - only created when first accessed
let _db: Database | null = null;
let _client: ReturnType<typeof postgres> | null = null;

function createDb(): Database {
  if (!_db) {
    const env = serverEnv();
    _client = postgres(env.DATABASE_URL, {
      max: 10,
      idle_timeout: 20,
      connect_timeout: 10,
      connection: {
        application_name: "taxdesk_app",
      },
    });

    _db = drizzle(_client, { schema });
  }
  return _db;
}

// Export lazy database getter to avoid top-level runtime env access
export const getDb = createDb;

/** Close the pool (server shutdown, end of a batch job). No-op if never opened. */
export async function closeDb(): Promise<void> {
  if (_client) {
    await _client.end({ timeout: 5 });
  }
  _client = null;
  _db = null;
}
