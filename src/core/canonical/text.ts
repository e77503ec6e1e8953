// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/canonical/text`
 * Purpose: Text normalization and whole-token phrase matching shared by key and language resolution.
 * Scope: Pure string helpers. Does not know about rule tables.
 * Invariants: normalizeQuestion is idempotent; matching never crosses token boundaries ("wa" does not match "what").
 * Side-effects: none
 * @internal
 */

const NON_WORD = /[^\p{L}\p{M}\p{N}\s]/gu;
const WHITESPACE = /\s+/g;

/**
 * Lowercase, replace punctuation with spaces, collapse whitespace.
 * Letters, combining marks and digits from any script are kept.
 */
export function normalizeQuestion(raw: string | null | undefined): string {
  return (raw ?? "")
    .normalize("NFC")
    .toLowerCase()
    .replace(NON_WORD, " ")
    .replace(WHITESPACE, " ")
    .trim();
}

export function tokenize(normalized: string): string[] {
  return normalized ? normalized.split(" ") : [];
}

/** True when `phrase` occurs in `tokens` as a contiguous token run */
export function containsPhrase(
  tokens: readonly string[],
  phrase: readonly string[]
): boolean {
  if (phrase.length === 0 || phrase.length > tokens.length) return false;
  for (let i = 0; i + phrase.length <= tokens.length; i++) {
    let matched = true;
    for (let j = 0; j < phrase.length; j++) {
      if (tokens[i + j] !== phrase[j]) {
        matched = false;
        break;
      }
    }
    if (matched) return true;
  }
  return false;
}
