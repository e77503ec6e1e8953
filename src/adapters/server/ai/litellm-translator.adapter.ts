// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/litellm-translator`
 * Purpose: Translator backed by the LiteLLM proxy.
 * Scope: Faithful translation of stored answers for the translation backlog. Does not judge translation quality.
 * Invariants: Returns the raw translated text (possibly empty); callers decide what empty means.
 * Side-effects: IO (HTTP calls to LiteLLM)
 * Links: Translator port, litellm.client.ts
 * @internal
 */

import { languageDisplayName } from "@/core/canonical/public";
import type { TranslateParams, Translator } from "@/ports";

import { chatCompletion, type LiteLlmConfig } from "./litellm.client";

export function translationSystemPrompt(targetLanguage: string): string {
  return [
    `Translate the user's text into ${targetLanguage}.`,
    "Keep numbers, amounts, dates, tax names and acronyms (PAYE, VAT, FIRS) unchanged.",
    "Preserve bullet points and line breaks.",
    "Do not add advice, notes or explanations. Output only the translation.",
  ].join("\n");
}

export class LiteLlmTranslator implements Translator {
  constructor(private readonly config: LiteLlmConfig) {}

  async translate(params: TranslateParams): Promise<string> {
    const result = await chatCompletion(this.config, {
      messages: [
        {
          role: "system",
          content: translationSystemPrompt(
            languageDisplayName(params.targetLanguage)
          ),
        },
        { role: "user", content: params.text },
      ],
      temperature: 0,
      maxTokens: 1000,
      abortSignal: params.abortSignal,
    });
    return result.content;
  }
}
