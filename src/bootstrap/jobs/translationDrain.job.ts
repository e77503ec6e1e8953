// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/jobs/translationDrain.job`
 * Purpose: Job module that wires the translation backlog drain to the application container.
 * Scope: Acquires the job lock, builds a job context, resolves deps, and calls drainTranslationBacklog. Does not contain business logic.
 * Invariants: SINGLE_WRITER: one drain at a time, so a pending job is never translated twice concurrently.
 * Side-effects: IO (database, translation gateway via ports)
 * Links: features/translations/services/drainTranslationBacklog.ts, scripts/translation-drain.ts
 * @public
 */

import { getContainer, resolveTranslationDeps } from "@/bootstrap/container";
import {
  type DrainSummary,
  drainTranslationBacklog,
} from "@/features/translations/public";
import { createJobContext } from "@/shared/observability";

export const TRANSLATION_DRAIN_LOCK = "translation_drain";

export type TranslationDrainJobResult =
  | ({ skipped: false } & DrainSummary)
  | { skipped: true };

export async function runTranslationDrainJob(): Promise<TranslationDrainJobResult> {
  const container = getContainer();
  const ctx = createJobContext(
    { baseLog: container.log, clock: container.clock },
    { jobId: "translations.drain" }
  );

  ctx.log.info({}, "Starting translation drain job");

  const run = await container.jobLock.runExclusive(
    TRANSLATION_DRAIN_LOCK,
    () => drainTranslationBacklog(resolveTranslationDeps(container), ctx)
  );

  if (!run.acquired) {
    ctx.log.info({}, "Translation drain already running, skipping");
    return { skipped: true };
  }
  return { skipped: false, ...run.result };
}
