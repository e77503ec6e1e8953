// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/answer-generator.port`
 * Purpose: Opaque external calls for answer generation and translation, plus typed LlmError classification.
 * Scope: Defines AnswerGenerator, Translator and LlmError. Does NOT contain implementations.
 * Invariants:
 *   - Every call is bounded by the caller's AbortSignal (timeout)
 *   - LlmError kind is derived from HTTP status codes, not string heuristics
 *   - A timeout is a failure like any other: no partial result is returned
 * Side-effects: none (interface definition only)
 * Links: Implemented by LiteLlmAnswerGenerator, LiteLlmTranslator and test fakes
 * @public
 */

import type { Language } from "@/core/canonical/public";

/**
 * Error classification kinds for generator/translator failures.
 * - timeout: kind='timeout' OR status=408
 * - rate_limited: status=429
 * - provider_4xx: status 400-499 (excluding 408, 429), including auth failures
 * - provider_5xx: status 500-599
 * - aborted: AbortError from AbortSignal
 * - unknown: All other errors (network, malformed body, empty answer)
 */
export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "provider_4xx"
  | "provider_5xx"
  | "aborted"
  | "unknown";

export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

export interface GenerateAnswerParams {
  question: string;
  language: Language;
  /** Caller-owned deadline */
  abortSignal: AbortSignal;
}

export interface GeneratedAnswer {
  answer: string;
  model: string;
}

export interface AnswerGenerator {
  /**
   * @throws LlmError on provider failure, timeout or empty answer
   */
  generate(params: GenerateAnswerParams): Promise<GeneratedAnswer>;
}

export interface TranslateParams {
  text: string;
  targetLanguage: Language;
  abortSignal: AbortSignal;
}

export interface Translator {
  /**
   * @returns translated text (may be empty; callers treat empty as failure)
   * @throws LlmError on provider failure or timeout
   */
  translate(params: TranslateParams): Promise<string>;
}
