// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/answer-store.port`
 * Purpose: Read ports for the curated Library and read/write ports for the self-populating Cache.
 * Scope: Interfaces only. Library is read-only to the pipeline apart from best-effort usage touches.
 * Invariants:
 *   - findBest returns only enabled rows, ordered priority desc, enabledAt desc, lastUsedAt desc
 *   - Cache upsert conflicts on (canonicalKey, lang) when a key exists, else (normalizedQuestion, lang); conflict overwrites answer/source and re-enables
 * Side-effects: none (interface definition only)
 * Links: Implemented by Drizzle and in-memory answer adapters
 * @public
 */

import type {
  AnswerLookup,
  CacheUpsert,
  StoredAnswer,
} from "@/core/answers/public";
import type { Language } from "@/core/canonical/public";

export interface AnswerReader {
  findBest(lookup: AnswerLookup, lang: Language): Promise<StoredAnswer | null>;

  /** Best-effort: use_count + 1, last_used_at = at */
  touch(id: string, at: Date): Promise<void>;
}

export type AnswerLibraryRepository = AnswerReader;

export interface AnswerCacheRepository extends AnswerReader {
  upsert(entry: CacheUpsert, at: Date): Promise<StoredAnswer>;
}
