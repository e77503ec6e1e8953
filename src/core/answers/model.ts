// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/answers/model`
 * Purpose: Domain types for the tiered answer store (Library, Cache) and the translation backlog.
 * Scope: Types only. Does not implement lookups or persistence.
 * Invariants: Library and Cache share one keying scheme; canonical-key lookups take priority over normalized-text lookups.
 * Side-effects: none
 * @public
 */

import type { CanonicalQuestion, Language } from "@/core/canonical/public";
import type { EntitlementDenial } from "@/core/entitlements/public";

export type AnswerTier = "library" | "cache";

/** Where a served answer came from */
export type AnswerSource = AnswerTier | "ai";

/** Provenance recorded on a cache row */
export type CacheEntrySource = "ai" | "library";

export type AnswerLookup =
  | { kind: "canonical"; canonicalKey: string }
  | { kind: "normalized"; normalized: string };

export interface StoredAnswer {
  id: string;
  tier: AnswerTier;
  canonicalKey: string | null;
  normalizedQuestion: string;
  lang: Language;
  answer: string;
  priority: number;
  enabledAt: Date;
  lastUsedAt: Date | null;
  useCount: number;
}

export interface CacheUpsert {
  /** null when the question has no usable canonical key */
  canonicalKey: string | null;
  normalizedQuestion: string;
  lang: Language;
  answer: string;
  source: CacheEntrySource;
}

export type ResolveOutcome =
  | {
      kind: "hit";
      answer: string;
      source: AnswerSource;
      languageUsed: Language;
      fallbackUsed: boolean;
      entryId: string | null;
      canonical: CanonicalQuestion;
    }
  | { kind: "denied"; denial: EntitlementDenial; canonical: CanonicalQuestion }
  | { kind: "generation_failed"; errorKind: string; canonical: CanonicalQuestion }
  | { kind: "not_found"; canonical: CanonicalQuestion };

export type TranslationJobStatus = "pending" | "done" | "failed";

export interface NewTranslationJob {
  canonicalKey: string;
  sourceLang: Language;
  targetLang: Language;
  sourceTable: AnswerTier;
}

export interface TranslationJob extends NewTranslationJob {
  id: string;
  status: TranslationJobStatus;
  attempts: number;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type TranslationFailureReason =
  | "source_not_found"
  | "source_empty"
  | "translation_empty";
