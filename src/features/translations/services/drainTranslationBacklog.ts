// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/translations/services/drainTranslationBacklog`
 * Purpose: Translate pending backlog jobs into Cache entries for their target language.
 * Scope: One bounded batch, oldest first, processed sequentially. Does not enqueue jobs.
 * Invariants:
 *   - Source rows are read at (canonicalKey, sourceLang) from the job's source table
 *   - Cache rows written here carry source library or ai following the source table
 *   - source_not_found, source_empty and translation_empty fail the job at once; thrown errors are retried up to maxAttempts
 * Side-effects: IO (via answer store ports, Translator)
 * Links: bootstrap/jobs/translationDrain.job.ts, core/answers/model.ts
 * @public
 */

import type {
  TranslationFailureReason,
  TranslationJob,
} from "@/core/answers/public";
import {
  type AnswerCacheRepository,
  type AnswerLibraryRepository,
  isLlmError,
  type TranslationBacklogRepository,
  type Translator,
} from "@/ports";
import {
  EVENT_NAMES,
  logEvent,
  type RequestContext,
} from "@/shared/observability";

export interface TranslationDrainDeps {
  backlog: TranslationBacklogRepository;
  library: AnswerLibraryRepository;
  cache: AnswerCacheRepository;
  translator: Translator;
  translationTimeoutMs: number;
  batchSize: number;
  maxAttempts: number;
}

export interface DrainSummary {
  processed: number;
  done: number;
  failed: number;
  retried: number;
}

type JobResult = "done" | "failed" | "retried";

export async function drainTranslationBacklog(
  deps: TranslationDrainDeps,
  ctx: RequestContext
): Promise<DrainSummary> {
  const jobs = await deps.backlog.listPending(deps.batchSize);
  const summary: DrainSummary = {
    processed: 0,
    done: 0,
    failed: 0,
    retried: 0,
  };

  for (const job of jobs) {
    const result = await processJob(deps, job, ctx);
    summary.processed++;
    summary[result]++;
  }

  logEvent(ctx.log, EVENT_NAMES.TRANSLATION_DRAIN_COMPLETE, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    ...summary,
  });
  return summary;
}

async function processJob(
  deps: TranslationDrainDeps,
  job: TranslationJob,
  ctx: RequestContext
): Promise<JobResult> {
  try {
    const reader = job.sourceTable === "library" ? deps.library : deps.cache;
    const source = await reader.findBest(
      { kind: "canonical", canonicalKey: job.canonicalKey },
      job.sourceLang
    );
    if (!source) return await fail(deps, job, "source_not_found", ctx);
    if (!source.answer.trim()) {
      return await fail(deps, job, "source_empty", ctx);
    }

    const translated = (
      await deps.translator.translate({
        text: source.answer,
        targetLanguage: job.targetLang,
        abortSignal: AbortSignal.timeout(deps.translationTimeoutMs),
      })
    ).trim();
    if (!translated) return await fail(deps, job, "translation_empty", ctx);

    const now = new Date(ctx.clock.now());
    await deps.cache.upsert(
      {
        canonicalKey: job.canonicalKey,
        normalizedQuestion: source.normalizedQuestion,
        lang: job.targetLang,
        answer: translated,
        source: job.sourceTable === "library" ? "library" : "ai",
      },
      now
    );
    await deps.backlog.markDone(job.id, now);
    return "done";
  } catch (error) {
    const message = isLlmError(error)
      ? `${error.kind}: ${error.message}`
      : error instanceof Error
        ? error.message
        : String(error);
    const updated = await deps.backlog.recordAttemptFailure(
      job.id,
      message,
      deps.maxAttempts,
      new Date(ctx.clock.now())
    );
    logEvent(ctx.log, EVENT_NAMES.TRANSLATION_JOB_FAILED, {
      reqId: ctx.reqId,
      routeId: ctx.routeId,
      jobId: job.id,
      canonicalKey: job.canonicalKey,
      targetLang: job.targetLang,
      attempts: updated.attempts,
      terminal: updated.status === "failed",
      error: message,
    });
    return updated.status === "failed" ? "failed" : "retried";
  }
}

async function fail(
  deps: TranslationDrainDeps,
  job: TranslationJob,
  reason: TranslationFailureReason,
  ctx: RequestContext
): Promise<JobResult> {
  await deps.backlog.markFailed(job.id, reason, new Date(ctx.clock.now()));
  logEvent(ctx.log, EVENT_NAMES.TRANSLATION_JOB_FAILED, {
    reqId: ctx.reqId,
    routeId: ctx.routeId,
    jobId: job.id,
    canonicalKey: job.canonicalKey,
    targetLang: job.targetLang,
    terminal: true,
    error: reason,
  });
  return "failed";
}
