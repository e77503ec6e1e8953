// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/canonical/rules`
 * Purpose: Deterministic canonical key derivation (`intent|channel|jurisdiction|period`) for raw question text.
 * Scope: Pure and total: every input, including empty or gibberish text, yields a well-formed key. Does not perform I/O.
 * Invariants:
 *   - Each field resolves independently by longest whole-token phrase match over its own table
 *   - Equal-length matches resolve by table order
 *   - Unresolved fields are ANY_FIELD
 * Side-effects: none
 * Links: data/canonical-rules.json, language.ts
 * @public
 */

import ruleTables from "./data/canonical-rules.json";
import { detectLanguage, normalizeLanguage } from "./language";
import {
  ANY_FIELD,
  CANONICAL_KEY_SEPARATOR,
  type CanonicalFields,
  type CanonicalQuestion,
} from "./model";
import { containsPhrase, normalizeQuestion, tokenize } from "./text";

interface CompiledPhrase {
  value: string;
  tokens: string[];
  length: number;
}

type RuleTable = Readonly<Record<string, readonly string[]>>;

/**
 * Flatten a `value -> phrases` table into phrases ordered longest first.
 * Array.prototype.sort is stable, so equal lengths keep table order.
 */
function compile(table: RuleTable): CompiledPhrase[] {
  const phrases: CompiledPhrase[] = [];
  for (const [value, keywords] of Object.entries(table)) {
    for (const keyword of keywords) {
      const tokens = tokenize(normalizeQuestion(keyword));
      if (tokens.length === 0) continue;
      phrases.push({ value, tokens, length: tokens.join(" ").length });
    }
  }
  return phrases.sort((a, b) =>
    b.tokens.length !== a.tokens.length
      ? b.tokens.length - a.tokens.length
      : b.length - a.length
  );
}

const INTENTS = compile(ruleTables.intents);
const CHANNELS = compile(ruleTables.channels);
const JURISDICTIONS = compile(ruleTables.jurisdictions);
const PERIODS = compile(ruleTables.periods);

function resolveField(
  tokens: readonly string[],
  phrases: readonly CompiledPhrase[]
): string {
  for (const phrase of phrases) {
    if (containsPhrase(tokens, phrase.tokens)) return phrase.value;
  }
  return ANY_FIELD;
}

export function extractFields(normalized: string): CanonicalFields {
  const tokens = tokenize(normalized);
  return {
    intent: resolveField(tokens, INTENTS),
    channel: resolveField(tokens, CHANNELS),
    jurisdiction: resolveField(tokens, JURISDICTIONS),
    period: resolveField(tokens, PERIODS),
  };
}

export function formatCanonicalKey(fields: CanonicalFields): string {
  return [fields.intent, fields.channel, fields.jurisdiction, fields.period].join(
    CANONICAL_KEY_SEPARATOR
  );
}

/** True when every field of the key is unresolved; such keys are too coarse to share answers. */
export function isWildcardKey(canonicalKey: string): boolean {
  return canonicalKey
    .split(CANONICAL_KEY_SEPARATOR)
    .every((field) => field === ANY_FIELD);
}

/**
 * Canonicalize a raw question.
 * An explicit language hint wins over detection; a hint that names no
 * supported language falls back to the base language rather than detection.
 */
export function canonicalize(
  question: string | null | undefined,
  languageHint?: string | null
): CanonicalQuestion {
  const normalized = normalizeQuestion(question);
  const fields = extractFields(normalized);
  const hint = languageHint?.trim();
  const languageExplicit = Boolean(hint);

  return {
    normalized,
    canonicalKey: formatCanonicalKey(fields),
    fields,
    language: languageExplicit
      ? normalizeLanguage(hint)
      : detectLanguage(normalized),
    languageExplicit,
  };
}
