// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/canonical/public`
 * Purpose: Public surface of the canonicalizer.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export {
  detectLanguage,
  isSupportedLanguage,
  languageDisplayName,
  normalizeLanguage,
  otherLanguages,
} from "./language";
export type { CanonicalFields, CanonicalQuestion, Language } from "./model";
export {
  ANY_FIELD,
  BASE_LANGUAGE,
  CANONICAL_KEY_SEPARATOR,
  SUPPORTED_LANGUAGES,
} from "./model";
export {
  canonicalize,
  extractFields,
  formatCanonicalKey,
  isWildcardKey,
} from "./rules";
export { normalizeQuestion } from "./text";
