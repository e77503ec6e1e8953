// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/answers/drizzle-translation-backlog`
 * Purpose: Drizzle implementation of TranslationBacklogRepository.
 * Scope: Insert-or-ignore enqueue and job status transitions. Does not translate.
 * Invariants: (canonical_key, target_lang) is unique; enqueue never overwrites an existing job.
 * Side-effects: IO (database operations)
 * Links: Implements TranslationBacklogRepository port
 * @public
 */

import { asc, eq, sql } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type {
  NewTranslationJob,
  TranslationJob,
} from "@/core/answers/public";
import type { TranslationBacklogRepository } from "@/ports";
import { translationBacklog } from "@/shared/db";

type BacklogRow = typeof translationBacklog.$inferSelect;

export class DrizzleTranslationBacklogRepository
  implements TranslationBacklogRepository
{
  constructor(private readonly db: Database) {}

  async enqueue(jobs: readonly NewTranslationJob[], at: Date): Promise<number> {
    if (jobs.length === 0) return 0;
    const rows = await this.db
      .insert(translationBacklog)
      .values(
        jobs.map((job) => ({
          canonicalKey: job.canonicalKey,
          sourceLang: job.sourceLang,
          targetLang: job.targetLang,
          sourceTable: job.sourceTable,
          status: "pending" as const,
          createdAt: at,
          updatedAt: at,
        }))
      )
      .onConflictDoNothing({
        target: [translationBacklog.canonicalKey, translationBacklog.targetLang],
      })
      .returning({ id: translationBacklog.id });
    return rows.length;
  }

  async listPending(limit: number): Promise<TranslationJob[]> {
    const rows = await this.db
      .select()
      .from(translationBacklog)
      .where(eq(translationBacklog.status, "pending"))
      .orderBy(asc(translationBacklog.createdAt))
      .limit(limit);
    return rows.map((row) => this.mapRow(row));
  }

  async markDone(id: string, at: Date): Promise<void> {
    await this.db
      .update(translationBacklog)
      .set({ status: "done", lastError: null, updatedAt: at })
      .where(eq(translationBacklog.id, id));
  }

  async markFailed(id: string, reason: string, at: Date): Promise<void> {
    await this.db
      .update(translationBacklog)
      .set({ status: "failed", lastError: reason, updatedAt: at })
      .where(eq(translationBacklog.id, id));
  }

  async recordAttemptFailure(
    id: string,
    error: string,
    maxAttempts: number,
    at: Date
  ): Promise<TranslationJob> {
    const [row] = await this.db
      .update(translationBacklog)
      .set({
        attempts: sql`${translationBacklog.attempts} + 1`,
        lastError: error,
        status: sql`case when ${translationBacklog.attempts} + 1 >= ${maxAttempts} then 'failed' else 'pending' end`,
        updatedAt: at,
      })
      .where(eq(translationBacklog.id, id))
      .returning();

    if (!row) {
      throw new Error(`Translation job not found: ${id}`);
    }
    return this.mapRow(row);
  }

  private mapRow(row: BacklogRow): TranslationJob {
    return {
      id: row.id,
      canonicalKey: row.canonicalKey,
      sourceLang: row.sourceLang,
      targetLang: row.targetLang,
      sourceTable: row.sourceTable,
      status: row.status,
      attempts: row.attempts,
      lastError: row.lastError,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }
}
