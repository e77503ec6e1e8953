// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/litellm-answer-generator`, `@adapters/server/ai/litellm-translator`
 * Purpose: Unit tests for the prompts and result handling of the answer generator and translator.
 * Scope: Adapter logic over a mocked fetch. Does NOT test a real LiteLLM service.
 * Invariants: The generator names the requested language in the user turn; an empty answer is an error.
 * Side-effects: none (mocked fetch)
 * Links: src/adapters/server/ai/litellm-answer-generator.adapter.ts, src/adapters/server/ai/litellm-translator.adapter.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { LiteLlmAnswerGenerator, LiteLlmTranslator } from "@/adapters/server";
import {
  ANSWER_SYSTEM_PROMPT,
} from "@/adapters/server/ai/litellm-answer-generator.adapter";
import { translationSystemPrompt } from "@/adapters/server/ai/litellm-translator.adapter";

const config = {
  baseUrl: "https://litellm.test",
  masterKey: "test-key",
  model: "tax-model",
};

function completion(content: string) {
  return {
    ok: true,
    json: async () => ({ choices: [{ message: { content } }] }),
  };
}

function sentBody(mockFetch: ReturnType<typeof vi.fn>): unknown {
  const init = mockFetch.mock.calls[0]?.[1];
  return JSON.parse(String(init?.body));
}

describe("adapters/server/ai LiteLLM answer adapters", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("LiteLlmAnswerGenerator", () => {
    it("asks in the requested language and returns the trimmed answer", async () => {
      mockFetch.mockResolvedValueOnce(completion(" VAT is 7.5%. "));
      const generator = new LiteLlmAnswerGenerator(config);

      const result = await generator.generate({
        question: "What is VAT?",
        language: "yo",
        abortSignal: new AbortController().signal,
      });

      expect(result).toEqual({ answer: "VAT is 7.5%.", model: "tax-model" });
      expect(sentBody(mockFetch)).toEqual({
        model: "tax-model",
        messages: [
          { role: "system", content: ANSWER_SYSTEM_PROMPT },
          { role: "user", content: "[Language: Yoruba] What is VAT?" },
        ],
        temperature: 0.2,
        max_tokens: 700,
      });
    });

    it("treats an empty answer as a failure", async () => {
      mockFetch.mockResolvedValueOnce(completion("   "));
      const generator = new LiteLlmAnswerGenerator(config);

      await expect(
        generator.generate({
          question: "What is VAT?",
          language: "en",
          abortSignal: new AbortController().signal,
        })
      ).rejects.toMatchObject({ name: "LlmError", kind: "unknown" });
    });

    it("propagates provider errors", async () => {
      mockFetch.mockResolvedValueOnce({ ok: false, status: 429, statusText: "Too Many" });
      const generator = new LiteLlmAnswerGenerator(config);

      await expect(
        generator.generate({
          question: "What is VAT?",
          language: "en",
          abortSignal: new AbortController().signal,
        })
      ).rejects.toMatchObject({ kind: "rate_limited", status: 429 });
    });
  });

  describe("LiteLlmTranslator", () => {
    it("translates deterministically into the target language", async () => {
      mockFetch.mockResolvedValueOnce(completion("Owo-ori VAT je 7.5%."));
      const translator = new LiteLlmTranslator(config);

      const text = await translator.translate({
        text: "VAT is 7.5%.",
        targetLanguage: "yo",
        abortSignal: new AbortController().signal,
      });

      expect(text).toBe("Owo-ori VAT je 7.5%.");
      expect(sentBody(mockFetch)).toEqual({
        model: "tax-model",
        messages: [
          { role: "system", content: translationSystemPrompt("Yoruba") },
          { role: "user", content: "VAT is 7.5%." },
        ],
        temperature: 0,
        max_tokens: 1000,
      });
    });

    it("names the language in the system prompt", () => {
      expect(translationSystemPrompt("Hausa").split("\n")[0]).toBe(
        "Translate the user's text into Hausa."
      );
    });
  });
});
