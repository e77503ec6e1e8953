// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ask/services/resolveAnswer`
 * Purpose: Tiered answer resolution: Library, then Cache, then AI generation, with base-language fallback.
 * Scope: Lookup order, gate hooks per tier, cache population and translation fan-out. Does not check the subscription.
 * Invariants:
 *   - LIBRARY_BEATS_CACHE: within a language, an enabled Library row always wins over Cache
 *   - Requested language is tried before the base language; a base-language hit sets fallbackUsed
 *   - A Cache serve passes the daily quota hook; a generation passes the credit hook
 *   - GENERATION_FAILURE_REFUNDS: a failed or empty generation releases the reservation and writes nothing to the Cache
 *   - Touches and backlog enqueues are best-effort and never fail the answer
 * Side-effects: IO (via answer store ports, AnswerGenerator)
 * Notes: A generator timeout (AbortSignal.timeout) is an ordinary generation failure.
 * Links: core/answers/rules.ts, entitlementGate.ts
 * @public
 */

import {
  lookupFor,
  lookupLanguages,
  type ResolveOutcome,
  type StoredAnswer,
  storableCanonicalKey,
  translationJobsFor,
} from "@/core/answers/public";
import {
  type CanonicalQuestion,
  canonicalize,
  type Language,
} from "@/core/canonical/public";
import type {
  CacheAdmission,
  CreditDecision,
  CreditReservation,
} from "@/core/entitlements/public";
import {
  type AnswerCacheRepository,
  type AnswerGenerator,
  type AnswerLibraryRepository,
  type AnswerReader,
  isLlmError,
  LlmError,
  type TranslationBacklogRepository,
} from "@/ports";
import {
  answerGenerationDurationMs,
  creditRefundsTotal,
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";
import { fireAndForget } from "@/shared/util";

export interface AnswerStoreDeps {
  library: AnswerLibraryRepository;
  cache: AnswerCacheRepository;
  backlog: TranslationBacklogRepository;
  /** null disables generation; misses resolve to not_found */
  generator: AnswerGenerator | null;
  generationTimeoutMs: number;
  /** Bound for touches and backlog enqueues */
  bestEffortTimeoutMs: number;
}

/** Entitlement steps the resolver calls when it reaches a paid tier */
export interface ResolveGateHooks {
  admitCacheServe(): Promise<CacheAdmission>;
  reserveCredit(): Promise<CreditDecision>;
  releaseCredit(reservation: CreditReservation): Promise<unknown>;
}

export interface ResolveInput {
  question: string;
  language?: string | null | undefined;
}

export async function resolveAnswer(
  deps: AnswerStoreDeps,
  hooks: ResolveGateHooks,
  input: ResolveInput,
  ctx: RequestContext
): Promise<ResolveOutcome> {
  const canonical = canonicalize(input.question, input.language);
  const lookup = lookupFor(canonical);
  const requested = canonical.language;

  for (const lang of lookupLanguages(requested)) {
    const fallbackUsed = lang !== requested;

    const fromLibrary = await deps.library.findBest(lookup, lang);
    if (fromLibrary) {
      await afterHit(deps, deps.library, fromLibrary, requested, ctx);
      return hit(fromLibrary, fallbackUsed, canonical);
    }

    const fromCache = await deps.cache.findBest(lookup, lang);
    if (fromCache) {
      const admission = await hooks.admitCacheServe();
      if (!admission.allowed) {
        return { kind: "denied", denial: admission, canonical };
      }
      await afterHit(deps, deps.cache, fromCache, requested, ctx);
      return hit(fromCache, fallbackUsed, canonical);
    }
  }

  if (!deps.generator) return { kind: "not_found", canonical };

  const credit = await hooks.reserveCredit();
  if (!credit.allowed) return { kind: "denied", denial: credit, canonical };

  const started = performance.now();
  let answer: string;
  try {
    const generated = await deps.generator.generate({
      question: input.question.trim(),
      language: requested,
      abortSignal: AbortSignal.timeout(deps.generationTimeoutMs),
    });
    answer = generated.answer.trim();
    if (!answer) {
      throw new LlmError("Generator returned an empty answer", "unknown");
    }
  } catch (error) {
    answerGenerationDurationMs.observe(
      { result: "error" },
      performance.now() - started
    );
    const errorKind = isLlmError(error) ? error.kind : "unknown";
    logEvent(ctx.log, EVENT_NAMES.ASK_GENERATION_FAILED, {
      reqId: ctx.reqId,
      routeId: ctx.routeId,
      errorKind,
      lang: requested,
    });

    await hooks.releaseCredit(credit.reservation);
    creditRefundsTotal.inc();
    logEvent(ctx.log, EVENT_NAMES.ASK_CREDIT_REFUNDED, {
      reqId: ctx.reqId,
      routeId: ctx.routeId,
      accountId: credit.reservation.accountId,
      cost: credit.reservation.cost,
    });

    return { kind: "generation_failed", errorKind, canonical };
  }
  answerGenerationDurationMs.observe(
    { result: "ok" },
    performance.now() - started
  );

  const now = new Date(ctx.clock.now());
  const canonicalKey = storableCanonicalKey(canonical);
  let entryId: string | null = null;
  try {
    const entry = await deps.cache.upsert(
      {
        canonicalKey,
        normalizedQuestion: canonical.normalized,
        lang: requested,
        answer,
        source: "ai",
      },
      now
    );
    entryId = entry.id;
  } catch (error) {
    // The credit is spent and the answer exists; the user still gets it
    ctx.log.error(
      { err: error, canonicalKey, lang: requested },
      "CRITICAL: cache upsert failed after generation - answer served uncached"
    );
  }

  if (entryId) {
    await enqueueTranslations(
      deps,
      translationJobsFor(canonicalKey, requested, "cache"),
      ctx
    );
  }

  return {
    kind: "hit",
    answer,
    source: "ai",
    languageUsed: requested,
    fallbackUsed: false,
    entryId,
    canonical,
  };
}

function hit(
  stored: StoredAnswer,
  fallbackUsed: boolean,
  canonical: CanonicalQuestion
): ResolveOutcome {
  return {
    kind: "hit",
    answer: stored.answer,
    source: stored.tier,
    languageUsed: stored.lang,
    fallbackUsed,
    entryId: stored.id,
    canonical,
  };
}

/**
 * Best-effort bookkeeping for a served row: usage touch, and a backlog entry
 * for the requested language when the row came from the base-language fallback.
 */
async function afterHit(
  deps: AnswerStoreDeps,
  reader: AnswerReader,
  stored: StoredAnswer,
  requested: Language,
  ctx: RequestContext
): Promise<void> {
  const now = new Date(ctx.clock.now());
  void fireAndForget(() => reader.touch(stored.id, now), {
    log: ctx.log,
    label: `${stored.tier}.touch`,
    timeoutMs: deps.bestEffortTimeoutMs,
  });

  if (stored.lang !== requested) {
    await enqueueTranslations(
      deps,
      translationJobsFor(stored.canonicalKey, stored.lang, stored.tier, [
        requested,
      ]),
      ctx
    );
  }
}

async function enqueueTranslations(
  deps: AnswerStoreDeps,
  jobs: ReturnType<typeof translationJobsFor>,
  ctx: RequestContext
): Promise<void> {
  if (jobs.length === 0) return;
  const now = new Date(ctx.clock.now());
  await fireAndForget(() => deps.backlog.enqueue(jobs, now), {
    log: ctx.log,
    label: "translation_backlog.enqueue",
    timeoutMs: deps.bestEffortTimeoutMs,
  });
}
