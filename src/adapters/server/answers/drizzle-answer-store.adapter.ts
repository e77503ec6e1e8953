// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/answers/drizzle-answer-store`
 * Purpose: Drizzle implementations of the Library and Cache answer repositories.
 * Scope: Best-candidate lookup, use-count touch, cache upsert. Does not decide tier order or language fallback.
 * Invariants:
 * - Only enabled rows are candidates
 * - Ordering: priority desc, enabled_at (library: updated_at) desc, last_used_at desc nulls last
 * - Cache upsert targets the partial unique index matching the key kind and re-enables the row
 * Side-effects: IO (database operations)
 * Links: Implements AnswerLibraryRepository, AnswerCacheRepository ports
 * @public
 */

import { and, desc, eq, isNull, isNotNull, type SQL, sql } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import type {
  AnswerLookup,
  CacheUpsert,
  StoredAnswer,
} from "@/core/answers/public";
import type { Language } from "@/core/canonical/public";
import type { AnswerCacheRepository, AnswerLibraryRepository } from "@/ports";
import { qaCache, qaLibrary } from "@/shared/db";

type LibraryRow = typeof qaLibrary.$inferSelect;
type CacheRow = typeof qaCache.$inferSelect;

function lookupCondition(
  table: typeof qaLibrary | typeof qaCache,
  lookup: AnswerLookup
): SQL | undefined {
  return lookup.kind === "canonical"
    ? eq(table.canonicalKey, lookup.canonicalKey)
    : and(
        isNull(table.canonicalKey),
        eq(table.normalizedQuestion, lookup.normalized)
      );
}

export class DrizzleAnswerLibraryRepository implements AnswerLibraryRepository {
  constructor(private readonly db: Database) {}

  async findBest(
    lookup: AnswerLookup,
    lang: Language
  ): Promise<StoredAnswer | null> {
    const [row] = await this.db
      .select()
      .from(qaLibrary)
      .where(
        and(
          eq(qaLibrary.enabled, true),
          eq(qaLibrary.lang, lang),
          lookupCondition(qaLibrary, lookup)
        )
      )
      .orderBy(
        desc(qaLibrary.priority),
        desc(qaLibrary.updatedAt),
        sql`${qaLibrary.lastUsedAt} desc nulls last`
      )
      .limit(1);
    return row ? this.mapRow(row) : null;
  }

  async touch(id: string, at: Date): Promise<void> {
    await this.db
      .update(qaLibrary)
      .set({ useCount: sql`${qaLibrary.useCount} + 1`, lastUsedAt: at })
      .where(eq(qaLibrary.id, id));
  }

  private mapRow(row: LibraryRow): StoredAnswer {
    return {
      id: row.id,
      tier: "library",
      canonicalKey: row.canonicalKey,
      normalizedQuestion: row.normalizedQuestion,
      lang: row.lang,
      answer: row.answer,
      priority: row.priority,
      enabledAt: row.updatedAt,
      lastUsedAt: row.lastUsedAt,
      useCount: row.useCount,
    };
  }
}

export class DrizzleAnswerCacheRepository implements AnswerCacheRepository {
  constructor(private readonly db: Database) {}

  async findBest(
    lookup: AnswerLookup,
    lang: Language
  ): Promise<StoredAnswer | null> {
    const [row] = await this.db
      .select()
      .from(qaCache)
      .where(
        and(
          eq(qaCache.enabled, true),
          eq(qaCache.lang, lang),
          lookupCondition(qaCache, lookup)
        )
      )
      .orderBy(
        desc(qaCache.priority),
        desc(qaCache.enabledAt),
        sql`${qaCache.lastUsedAt} desc nulls last`
      )
      .limit(1);
    return row ? this.mapRow(row) : null;
  }

  async touch(id: string, at: Date): Promise<void> {
    await this.db
      .update(qaCache)
      .set({ useCount: sql`${qaCache.useCount} + 1`, lastUsedAt: at })
      .where(eq(qaCache.id, id));
  }

  async upsert(entry: CacheUpsert, at: Date): Promise<StoredAnswer> {
    const keyed = entry.canonicalKey !== null;
    const [row] = await this.db
      .insert(qaCache)
      .values({
        canonicalKey: entry.canonicalKey,
        normalizedQuestion: entry.normalizedQuestion,
        lang: entry.lang,
        answer: entry.answer,
        source: entry.source,
        enabled: true,
        enabledAt: at,
        updatedAt: at,
      })
      .onConflictDoUpdate({
        target: keyed
          ? [qaCache.canonicalKey, qaCache.lang]
          : [qaCache.normalizedQuestion, qaCache.lang],
        targetWhere: keyed
          ? isNotNull(qaCache.canonicalKey)
          : isNull(qaCache.canonicalKey),
        set: {
          answer: entry.answer,
          source: entry.source,
          normalizedQuestion: entry.normalizedQuestion,
          enabled: true,
          enabledAt: at,
          updatedAt: at,
        },
      })
      .returning();

    if (!row) {
      throw new Error("Failed to upsert cache entry");
    }
    return this.mapRow(row);
  }

  private mapRow(row: CacheRow): StoredAnswer {
    return {
      id: row.id,
      tier: "cache",
      canonicalKey: row.canonicalKey,
      normalizedQuestion: row.normalizedQuestion,
      lang: row.lang,
      answer: row.answer,
      priority: row.priority,
      enabledAt: row.enabledAt,
      lastUsedAt: row.lastUsedAt,
      useCount: row.useCount,
    };
  }
}
