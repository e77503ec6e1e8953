// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/answers/public`
 * Purpose: Public surface for answer store domain types and rules.
 * Side-effects: none
 * @public
 */

export type {
  AnswerLookup,
  AnswerSource,
  AnswerTier,
  CacheEntrySource,
  CacheUpsert,
  NewTranslationJob,
  ResolveOutcome,
  StoredAnswer,
  TranslationFailureReason,
  TranslationJob,
  TranslationJobStatus,
} from "./model";
export {
  compareCandidates,
  lookupFor,
  lookupLanguages,
  matchesLookup,
  pickBestCandidate,
  storableCanonicalKey,
  translationJobsFor,
} from "./rules";
