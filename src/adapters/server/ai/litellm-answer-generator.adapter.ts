// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/litellm-answer-generator`
 * Purpose: AnswerGenerator backed by the LiteLLM proxy.
 * Scope: Builds the tax-assistant prompt and maps the completion to a GeneratedAnswer. Does not cache or bill.
 * Invariants: An empty answer is an error (LlmError kind unknown), never an empty hit.
 * Side-effects: IO (HTTP calls to LiteLLM)
 * Links: AnswerGenerator port, litellm.client.ts
 * @internal
 */

import { languageDisplayName } from "@/core/canonical/public";
import {
  type AnswerGenerator,
  type GeneratedAnswer,
  type GenerateAnswerParams,
  isLlmError,
  LlmError,
} from "@/ports";
import { makeLogger } from "@/shared/observability";

import { chatCompletion, type LiteLlmConfig } from "./litellm.client";

const logger = makeLogger({ component: "LiteLlmAnswerGenerator" });

export const ANSWER_SYSTEM_PROMPT = [
  "You are a careful Nigerian tax assistant.",
  "Answer questions about Nigerian personal and business taxes: PAYE, VAT, withholding tax, company income tax, filing deadlines and state revenue services.",
  "Be concise and practical. Use short paragraphs or bullet points.",
  "If a rule differs by state, say so and name the state revenue service to contact.",
  "If you are not sure, say so and recommend confirming with the relevant tax authority.",
  "Answer in the language requested by the user.",
].join("\n");

export class LiteLlmAnswerGenerator implements AnswerGenerator {
  constructor(private readonly config: LiteLlmConfig) {}

  async generate(params: GenerateAnswerParams): Promise<GeneratedAnswer> {
    try {
      const result = await chatCompletion(this.config, {
        messages: [
          { role: "system", content: ANSWER_SYSTEM_PROMPT },
          {
            role: "user",
            content: `[Language: ${languageDisplayName(params.language)}] ${params.question}`,
          },
        ],
        temperature: 0.2,
        maxTokens: 700,
        abortSignal: params.abortSignal,
      });

      if (!result.content) {
        throw new LlmError("LiteLLM returned an empty answer", "unknown");
      }
      return { answer: result.content, model: result.model };
    } catch (error) {
      logger.warn(
        {
          errorKind: isLlmError(error) ? error.kind : "unknown",
          status: isLlmError(error) ? error.status : undefined,
          language: params.language,
        },
        "answer generation failed"
      );
      throw error;
    }
  }
}
