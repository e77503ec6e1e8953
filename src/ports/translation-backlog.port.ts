// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/translation-backlog.port`
 * Purpose: Durable queue of (canonical key, target language) translations awaiting the drain job.
 * Scope: Interface only. Does not translate.
 * Invariants: IDEMPOTENT_ENQUEUE: a second enqueue for the same (canonicalKey, targetLang) is a no-op, never a duplicate row.
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzleTranslationBacklog and InMemoryTranslationBacklog
 * @public
 */

import type {
  NewTranslationJob,
  TranslationJob,
} from "@/core/answers/public";

export interface TranslationBacklogRepository {
  /** Insert-or-ignore; returns the number of rows actually created */
  enqueue(jobs: readonly NewTranslationJob[], at: Date): Promise<number>;

  /** Oldest pending jobs first */
  listPending(limit: number): Promise<TranslationJob[]>;

  markDone(id: string, at: Date): Promise<void>;

  markFailed(id: string, reason: string, at: Date): Promise<void>;

  /**
   * Record a failed attempt; the job stays pending until attempts reach `maxAttempts`, then becomes failed.
   */
  recordAttemptFailure(
    id: string,
    error: string,
    maxAttempts: number,
    at: Date
  ): Promise<TranslationJob>;
}
