// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/canonical/model`
 * Purpose: Domain types for canonicalized questions and language tags.
 * Scope: Types and constants only. Does not perform normalization or detection.
 * Invariants: A canonical key always has exactly four fields; unresolved fields carry ANY_FIELD.
 * Side-effects: none
 * Links: Used by canonical rules, answer store lookups, translation backlog
 * @public
 */

/** Supported answer languages; index 0 is the base language. */
export const SUPPORTED_LANGUAGES = ["en", "yo", "ig", "ha", "pcm"] as const;

export type Language = (typeof SUPPORTED_LANGUAGES)[number];

export const BASE_LANGUAGE: Language = "en";

/** Placeholder for an unresolved canonical key field */
export const ANY_FIELD = "any";

export const CANONICAL_KEY_SEPARATOR = "|";

export interface CanonicalFields {
  intent: string;
  channel: string;
  jurisdiction: string;
  period: string;
}

export interface CanonicalQuestion {
  /** Lowercased, punctuation-free, whitespace-collapsed question text */
  normalized: string;
  /** `intent|channel|jurisdiction|period` */
  canonicalKey: string;
  fields: CanonicalFields;
  language: Language;
  /** True when the language came from an explicit hint rather than detection */
  languageExplicit: boolean;
}
