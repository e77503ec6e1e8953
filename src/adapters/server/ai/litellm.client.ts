// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/litellm.client`
 * Purpose: Minimal OpenAI-compatible chat completion call against the LiteLLM proxy.
 * Scope: One non-streaming completion with typed error mapping. Does not build prompts.
 * Invariants: Never logs prompts/keys/answers; every call carries the caller's AbortSignal; failures are LlmError.
 * Side-effects: IO (HTTP calls to LiteLLM)
 * Links: litellm-answer-generator.adapter.ts, litellm-translator.adapter.ts
 * @internal
 */

import { z } from "zod";

import { classifyLlmErrorFromStatus, LlmError } from "@/ports";

export interface LiteLlmConfig {
  baseUrl: string;
  masterKey: string | undefined;
  model: string;
}

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface ChatCompletionParams {
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  abortSignal: AbortSignal;
  /** LiteLLM end-user attribution */
  user?: string | undefined;
}

export interface ChatCompletionResult {
  content: string;
  model: string;
}

const completionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
});

export async function chatCompletion(
  config: LiteLlmConfig,
  params: ChatCompletionParams
): Promise<ChatCompletionResult> {
  let response: Response;
  try {
    response = await fetch(`${config.baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...(config.masterKey && {
          Authorization: `Bearer ${config.masterKey}`,
        }),
      },
      body: JSON.stringify({
        model: config.model,
        messages: params.messages,
        temperature: params.temperature,
        max_tokens: params.maxTokens,
        ...(params.user && { user: params.user }),
      }),
      signal: params.abortSignal,
    });
  } catch (error) {
    // Handle fetch errors (network, timeout, abort)
    if (error instanceof Error) {
      if (error.name === "TimeoutError") {
        throw new LlmError("LiteLLM request timed out", "timeout", 408);
      }
      if (error.name === "AbortError") {
        throw new LlmError("LiteLLM request aborted", "aborted");
      }
      throw new LlmError(`LiteLLM network error: ${error.message}`, "unknown");
    }
    throw new LlmError("LiteLLM completion failed: Unknown error", "unknown");
  }

  if (!response.ok) {
    const kind = classifyLlmErrorFromStatus(response.status);
    throw new LlmError(
      `LiteLLM API error: ${response.status} ${response.statusText}`,
      kind,
      response.status
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch {
    throw new LlmError("Invalid response from LiteLLM", "unknown");
  }

  const parsed = completionResponseSchema.safeParse(body);
  const content = parsed.success
    ? parsed.data.choices[0]?.message.content
    : undefined;
  if (!parsed.success || typeof content !== "string") {
    throw new LlmError("Invalid response from LiteLLM", "unknown");
  }

  return {
    content: content.trim(),
    model: parsed.data.model ?? config.model,
  };
}
