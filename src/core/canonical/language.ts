// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/canonical/language`
 * Purpose: Language hint normalization and keyword-based language detection.
 * Scope: Pure functions over fixed alias and hint tables. Does not translate or call external services.
 * Invariants: Deterministic; unknown hints and unmatched text resolve to BASE_LANGUAGE.
 * Side-effects: none
 * Notes: Detection checks languages in a fixed order (yo, ha, ig, pcm); first whole-token hint match wins.
 * Links: data/languages.json
 * @public
 */

import languageTables from "./data/languages.json";
import { BASE_LANGUAGE, type Language, SUPPORTED_LANGUAGES } from "./model";
import { containsPhrase, normalizeQuestion, tokenize } from "./text";

const DETECTION_ORDER: readonly Language[] = ["yo", "ha", "ig", "pcm"];

const ALIASES: Readonly<Record<string, string>> = languageTables.aliases;
const DISPLAY_NAMES: Readonly<Record<string, string>> =
  languageTables.displayNames;

const HINTS: ReadonlyMap<Language, readonly string[][]> = new Map(
  DETECTION_ORDER.map((lang) => {
    const table: Readonly<Record<string, readonly string[]>> =
      languageTables.hints;
    const phrases = table[lang] ?? [];
    return [lang, phrases.map((p) => tokenize(normalizeQuestion(p)))];
  })
);

export function isSupportedLanguage(value: string): value is Language {
  return SUPPORTED_LANGUAGES.some((lang) => lang === value);
}

/**
 * Map an explicit language hint ("Yoruba", "pidgin", "HA") to a supported tag.
 * Empty or unknown hints resolve to the base language.
 */
export function normalizeLanguage(hint: string | null | undefined): Language {
  const value = (hint ?? "").trim().toLowerCase().replace(/\s+/g, " ");
  if (!value) return BASE_LANGUAGE;
  const aliased = ALIASES[value] ?? value;
  return isSupportedLanguage(aliased) ? aliased : BASE_LANGUAGE;
}

/**
 * Classify already-normalized text by keyword hints.
 */
export function detectLanguage(normalized: string): Language {
  const tokens = tokenize(normalized);
  if (tokens.length === 0) return BASE_LANGUAGE;

  for (const lang of DETECTION_ORDER) {
    const phrases = HINTS.get(lang) ?? [];
    if (phrases.some((phrase) => containsPhrase(tokens, phrase))) {
      return lang;
    }
  }
  return BASE_LANGUAGE;
}

/** Languages other than `lang`, in supported order */
export function otherLanguages(lang: Language): Language[] {
  return SUPPORTED_LANGUAGES.filter((l) => l !== lang);
}

export function languageDisplayName(lang: Language): string {
  return DISPLAY_NAMES[lang] ?? lang;
}
