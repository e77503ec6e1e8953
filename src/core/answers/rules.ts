// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/answers/rules`
 * Purpose: Lookup-key selection, candidate ordering and translation fan-out for the answer store.
 * Scope: Pure functions. Does not read or write storage.
 * Invariants:
 *   - WILDCARD_FALLS_BACK_TO_TEXT: an all-"any" canonical key is never used for lookup or cache keying
 *   - CANDIDATE_ORDER: priority desc, then enabledAt desc, then lastUsedAt desc (never-used last)
 * Side-effects: none
 * @public
 */

import {
  BASE_LANGUAGE,
  type CanonicalQuestion,
  isWildcardKey,
  type Language,
  otherLanguages,
} from "@/core/canonical/public";

import type {
  AnswerLookup,
  AnswerTier,
  NewTranslationJob,
  StoredAnswer,
} from "./model";

/** Canonical key to store with an answer, or null when it is a wildcard */
export function storableCanonicalKey(canonical: CanonicalQuestion): string | null {
  return isWildcardKey(canonical.canonicalKey) ? null : canonical.canonicalKey;
}

export function lookupFor(canonical: CanonicalQuestion): AnswerLookup {
  const key = storableCanonicalKey(canonical);
  return key
    ? { kind: "canonical", canonicalKey: key }
    : { kind: "normalized", normalized: canonical.normalized };
}

/** Languages to try, in order: requested first, then the base language. */
export function lookupLanguages(requested: Language): Language[] {
  return requested === BASE_LANGUAGE ? [requested] : [requested, BASE_LANGUAGE];
}

export function matchesLookup(row: StoredAnswer, lookup: AnswerLookup): boolean {
  return lookup.kind === "canonical"
    ? row.canonicalKey === lookup.canonicalKey
    : row.canonicalKey === null && row.normalizedQuestion === lookup.normalized;
}

/**
 * Comparator implementing CANDIDATE_ORDER; negative when `a` wins.
 */
export function compareCandidates(a: StoredAnswer, b: StoredAnswer): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  const enabled = b.enabledAt.getTime() - a.enabledAt.getTime();
  if (enabled !== 0) return enabled;
  const aUsed = a.lastUsedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  const bUsed = b.lastUsedAt?.getTime() ?? Number.NEGATIVE_INFINITY;
  if (aUsed === bUsed) return 0;
  return bUsed > aUsed ? 1 : -1;
}

export function pickBestCandidate(
  rows: readonly StoredAnswer[]
): StoredAnswer | null {
  return [...rows].sort(compareCandidates)[0] ?? null;
}

/**
 * Backlog jobs that fan an answer out to other languages.
 * Wildcard keys are not translatable by key and produce no jobs.
 */
export function translationJobsFor(
  canonicalKey: string | null,
  sourceLang: Language,
  sourceTable: AnswerTier,
  targets: readonly Language[] = otherLanguages(sourceLang)
): NewTranslationJob[] {
  if (!canonicalKey || isWildcardKey(canonicalKey)) return [];
  return targets
    .filter((target) => target !== sourceLang)
    .map((targetLang) => ({ canonicalKey, sourceLang, targetLang, sourceTable }));
}
