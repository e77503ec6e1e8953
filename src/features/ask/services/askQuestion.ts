// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ask/services/askQuestion`
 * Purpose: Ask pipeline: input validation, first-ask trial, subscription check, tiered resolution, telemetry.
 * Scope: Orchestrates the entitlement gate and answer resolver for one question. Does not parse HTTP.
 * Invariants:
 *   - Every business outcome is a typed result, never a thrown error
 *   - Denials and failures carry a human-facing message without internal detail
 *   - The qa_events row is best-effort and never changes the result
 * Side-effects: IO (via ports), metrics, logging
 * Links: entitlementGate.ts, resolveAnswer.ts, contracts/ask.v1.contract.ts
 * @public
 */

import type { AnswerSource, ResolveOutcome } from "@/core/answers/public";
import {
  type CanonicalQuestion,
  canonicalize,
  type Language,
} from "@/core/canonical/public";
import {
  type CreditDetails,
  creditCostForMode,
  denialMessage,
  type EntitlementDenial,
  type InteractionMode,
  type QuotaDetails,
} from "@/core/entitlements/public";
import { isTrialNotEligibleError } from "@/core/subscriptions/public";
import { startTrial } from "@/features/subscriptions/public";
import type { QaEvent, QaEventLog } from "@/ports";
import {
  askOutcomesTotal,
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";
import { fireAndForget } from "@/shared/util";

import {
  admitCacheServe,
  checkSubscription,
  type EntitlementGateDeps,
  releaseCredit,
  reserveCredit,
} from "./entitlementGate";
import {
  type AnswerStoreDeps,
  type ResolveGateHooks,
  resolveAnswer,
} from "./resolveAnswer";

export const MAX_QUESTION_LENGTH = 2000;

export interface AskDeps {
  gate: EntitlementGateDeps;
  answers: AnswerStoreDeps;
  qaEvents: QaEventLog;
  /** Start the lifetime trial on the first question of an account with no history */
  autoTrialOnFirstAsk: boolean;
}

export interface AskInput {
  accountId: string;
  question: string;
  language?: string | null | undefined;
  mode: InteractionMode;
  channel?: string | null | undefined;
}

export type AskResult =
  | {
      ok: true;
      answer: string;
      source: AnswerSource;
      language: Language;
      fallbackUsed: boolean;
    }
  | {
      ok: false;
      error: "cache_limit_reached";
      message: string;
      quota: QuotaDetails;
    }
  | { ok: false; error: "no_credits"; message: string; credit: CreditDetails }
  | {
      ok: false;
      error:
        | "subscription_required"
        | "generation_failed"
        | "not_found"
        | "invalid_request";
      message: string;
    };

const GENERATION_FAILED_MESSAGE =
  "We could not generate an answer right now and no credit was used. Please try again shortly.";
const NOT_FOUND_MESSAGE = "No answer is available for this question yet.";
const INVALID_QUESTION_MESSAGE = `Question must be between 1 and ${MAX_QUESTION_LENGTH} characters.`;

export async function askQuestion(
  deps: AskDeps,
  input: AskInput,
  ctx: RequestContext
): Promise<AskResult> {
  const started = performance.now();
  const question = input.question.trim();
  if (!question || question.length > MAX_QUESTION_LENGTH) {
    return {
      ok: false,
      error: "invalid_request",
      message: INVALID_QUESTION_MESSAGE,
    };
  }

  if (deps.autoTrialOnFirstAsk) {
    await ensureFirstTrial(deps, input.accountId, ctx);
  }

  const check = await checkSubscription(deps.gate, input.accountId, ctx);
  let outcome: ResolveOutcome;
  if (!check.allowed) {
    outcome = {
      kind: "denied",
      denial: { allowed: false, reason: check.reason },
      canonical: canonicalize(question, input.language),
    };
  } else {
    const hooks: ResolveGateHooks = {
      admitCacheServe: () =>
        admitCacheServe(
          deps.gate,
          { accountId: input.accountId, planCode: check.status.planCode },
          ctx
        ),
      reserveCredit: () =>
        reserveCredit(deps.gate, {
          accountId: input.accountId,
          mode: input.mode,
        }),
      releaseCredit: (reservation) => releaseCredit(deps.gate, reservation),
    };
    outcome = await resolveAnswer(
      deps.answers,
      hooks,
      { question, language: input.language },
      ctx
    );
  }

  const result = toAskResult(outcome);
  recordOutcome(
    deps,
    input,
    question,
    outcome,
    performance.now() - started,
    ctx
  );
  return result;
}

async function ensureFirstTrial(
  deps: AskDeps,
  accountId: string,
  ctx: RequestContext
): Promise<void> {
  const subscriptionDeps = deps.gate.subscription;
  if (await subscriptionDeps.subscriptions.hasAnyRecord(accountId)) return;
  try {
    const record = await startTrial(subscriptionDeps, accountId, ctx);
    logEvent(ctx.log, EVENT_NAMES.ASK_TRIAL_STARTED, {
      reqId: ctx.reqId,
      routeId: ctx.routeId,
      accountId,
      expiresAt: record.periodEnd.toISOString(),
    });
  } catch (error) {
    // A concurrent first question already started it
    if (!isTrialNotEligibleError(error)) throw error;
  }
}

function toAskResult(outcome: ResolveOutcome): AskResult {
  switch (outcome.kind) {
    case "hit":
      return {
        ok: true,
        answer: outcome.answer,
        source: outcome.source,
        language: outcome.languageUsed,
        fallbackUsed: outcome.fallbackUsed,
      };
    case "denied":
      return denialResult(outcome.denial);
    case "generation_failed":
      return {
        ok: false,
        error: "generation_failed",
        message: GENERATION_FAILED_MESSAGE,
      };
    case "not_found":
      return { ok: false, error: "not_found", message: NOT_FOUND_MESSAGE };
  }
}

function denialResult(denial: EntitlementDenial): AskResult {
  const message = denialMessage(denial.reason);
  switch (denial.reason) {
    case "cache_limit_reached":
      return { ok: false, error: denial.reason, message, quota: denial.quota };
    case "no_credits":
      return { ok: false, error: denial.reason, message, credit: denial.credit };
    case "subscription_required":
      return { ok: false, error: denial.reason, message };
  }
}

function recordOutcome(
  deps: AskDeps,
  input: AskInput,
  question: string,
  outcome: ResolveOutcome,
  latencyMs: number,
  ctx: RequestContext
): void {
  const source = outcome.kind === "hit" ? outcome.source : null;
  askOutcomesTotal.inc({ outcome: outcome.kind, source: source ?? "none" });

  const base = {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    accountId: input.accountId,
  };
  if (outcome.kind === "hit") {
    logEvent(ctx.log, EVENT_NAMES.ASK_RESOLVED, {
      ...base,
      source: outcome.source,
      lang: outcome.languageUsed,
      fallbackUsed: outcome.fallbackUsed,
      canonicalKey: outcome.canonical.canonicalKey,
    });
  } else if (outcome.kind === "denied") {
    logEvent(ctx.log, EVENT_NAMES.ASK_DENIED, {
      ...base,
      reason: outcome.denial.reason,
    });
  }

  const event = qaEventFor(input, question, outcome.canonical, outcome, {
    source,
    latencyMs,
    at: new Date(ctx.clock.now()),
  });
  void fireAndForget(() => deps.qaEvents.record(event), {
    log: ctx.log,
    label: "qa_events.record",
    timeoutMs: deps.answers.bestEffortTimeoutMs,
  });
}

function qaEventFor(
  input: AskInput,
  question: string,
  canonical: CanonicalQuestion,
  outcome: ResolveOutcome,
  meta: { source: AnswerSource | null; latencyMs: number; at: Date }
): QaEvent {
  const common = {
    accountId: input.accountId,
    channel: input.channel ?? null,
    mode: input.mode,
    question,
    normalizedQuestion: canonical.normalized,
    canonicalKey: canonical.canonicalKey,
    source: meta.source,
    latencyMs: Math.round(meta.latencyMs),
    createdAt: meta.at,
  };
  switch (outcome.kind) {
    case "hit":
      return {
        ...common,
        lang: outcome.languageUsed,
        outcome: "ok",
        reason: null,
        fallbackUsed: outcome.fallbackUsed,
        creditCost: outcome.source === "ai" ? creditCostForMode(input.mode) : 0,
      };
    case "denied":
      return {
        ...common,
        lang: canonical.language,
        outcome: "blocked",
        reason: outcome.denial.reason,
        fallbackUsed: false,
        creditCost: 0,
      };
    case "generation_failed":
    case "not_found":
      return {
        ...common,
        lang: canonical.language,
        outcome: "error",
        reason:
          outcome.kind === "generation_failed"
            ? outcome.errorKind
            : "not_found",
        fallbackUsed: false,
        creditCost: 0,
      };
  }
}
