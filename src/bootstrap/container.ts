// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for application composition root with environment-based adapter selection.
 * Scope: Wire adapters to ports for runtime dependency injection; resolve per-feature deps from env. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; config.unhandledErrorPolicy set by env.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire the in-process store and fakes; ContainerConfig controls wrapper behavior.
 * Links: Used by API routes, facades and batch jobs; configure adapters here for DI.
 * @public
 */

import type { Logger } from "pino";

import {
  DrizzleAnswerCacheRepository,
  DrizzleAnswerLibraryRepository,
  DrizzleCreditLedger,
  DrizzleDailyUsageCounter,
  DrizzlePlanCatalog,
  DrizzleProcessedPaymentRepository,
  DrizzleQaEventLog,
  DrizzleSubscriptionRepository,
  DrizzleTranslationBacklogRepository,
  getDb,
  LiteLlmAnswerGenerator,
  LiteLlmTranslator,
  PaystackPaymentVerifier,
  PgAdvisoryJobLock,
  SystemClock,
} from "@/adapters/server";
import {
  getTestAnswerGenerator,
  getTestClock,
  getTestMemoryStore,
  getTestPaymentVerifier,
  getTestTranslator,
  MemoryAnswerCacheRepository,
  MemoryAnswerLibraryRepository,
  MemoryCreditLedger,
  MemoryDailyUsageCounter,
  MemoryJobLock,
  MemoryPlanCatalog,
  MemoryProcessedPaymentRepository,
  MemoryQaEventLog,
  MemorySubscriptionRepository,
  MemoryTranslationBacklogRepository,
} from "@/adapters/test";
import { daysToMs } from "@/core/subscriptions/public";
import type { AskDeps } from "@/features/ask/public";
import type { PaymentFulfillmentDeps } from "@/features/payments/public";
import type { SubscriptionDeps } from "@/features/subscriptions/public";
import type { TranslationDrainDeps } from "@/features/translations/public";
import type {
  AnswerCacheRepository,
  AnswerGenerator,
  AnswerLibraryRepository,
  Clock,
  CreditLedger,
  DailyUsageCounter,
  JobLock,
  PaymentVerifier,
  PlanCatalog,
  ProcessedPaymentRepository,
  QaEventLog,
  SubscriptionRepository,
  TranslationBacklogRepository,
  Translator,
} from "@/ports";
import { serverEnv } from "@/shared/env";
import { makeLogger } from "@/shared/observability";

export type UnhandledErrorPolicy = "rethrow" | "respond_500";

export interface ContainerConfig {
  /** How to handle unhandled errors in route wrappers: rethrow for dev/test, respond_500 for production safety */
  unhandledErrorPolicy: UnhandledErrorPolicy;
  /** Deploy environment for metrics/logging (e.g., "local", "preview", "production") */
  DEPLOY_ENVIRONMENT: string;
}

export interface Container {
  log: Logger;
  config: ContainerConfig;
  clock: Clock;
  plans: PlanCatalog;
  subscriptions: SubscriptionRepository;
  ledger: CreditLedger;
  usage: DailyUsageCounter;
  library: AnswerLibraryRepository;
  cache: AnswerCacheRepository;
  backlog: TranslationBacklogRepository;
  qaEvents: QaEventLog;
  processedPayments: ProcessedPaymentRepository;
  verifier: PaymentVerifier;
  /** null when no generation gateway is configured: misses end in not_found */
  generator: AnswerGenerator | null;
  translator: Translator;
  jobLock: JobLock;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger({ service: env.SERVICE_NAME });

  // Startup log - confirm config (no URLs/secrets)
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      autoTrial: env.AUTO_TRIAL_ON_FIRST_ASK,
      graceWindowDays: env.GRACE_WINDOW_DAYS,
    },
    "container initialized"
  );

  const config: ContainerConfig = {
    unhandledErrorPolicy: env.isProd ? "respond_500" : "rethrow",
    DEPLOY_ENVIRONMENT: env.DEPLOY_ENVIRONMENT ?? "local",
  };

  // Environment-based adapter wiring - single source of truth
  if (env.isTestMode) {
    const store = getTestMemoryStore();
    return {
      log,
      config,
      clock: getTestClock(),
      plans: new MemoryPlanCatalog(store),
      subscriptions: new MemorySubscriptionRepository(store),
      ledger: new MemoryCreditLedger(store),
      usage: new MemoryDailyUsageCounter(store),
      library: new MemoryAnswerLibraryRepository(store),
      cache: new MemoryAnswerCacheRepository(store),
      backlog: new MemoryTranslationBacklogRepository(store),
      qaEvents: new MemoryQaEventLog(store),
      processedPayments: new MemoryProcessedPaymentRepository(store),
      verifier: getTestPaymentVerifier(),
      generator: getTestAnswerGenerator(),
      translator: getTestTranslator(),
      jobLock: new MemoryJobLock(),
    };
  }

  const db = getDb();
  const llmConfig = {
    baseUrl: env.LITELLM_BASE_URL,
    masterKey: env.LITELLM_MASTER_KEY,
    model: env.DEFAULT_MODEL,
  };

  // Generation is optional outside production (graceful degradation)
  let generator: AnswerGenerator | null = new LiteLlmAnswerGenerator(
    llmConfig
  );
  if (!env.LITELLM_MASTER_KEY && !env.isProd) {
    log.warn(
      "LITELLM_MASTER_KEY not configured; uncached questions will return not_found"
    );
    generator = null;
  }

  return {
    log,
    config,
    clock: new SystemClock(),
    plans: new DrizzlePlanCatalog(db),
    subscriptions: new DrizzleSubscriptionRepository(db),
    ledger: new DrizzleCreditLedger(db),
    usage: new DrizzleDailyUsageCounter(db),
    library: new DrizzleAnswerLibraryRepository(db),
    cache: new DrizzleAnswerCacheRepository(db),
    backlog: new DrizzleTranslationBacklogRepository(db),
    qaEvents: new DrizzleQaEventLog(db),
    processedPayments: new DrizzleProcessedPaymentRepository(db),
    verifier: new PaystackPaymentVerifier({
      baseUrl: env.PAYSTACK_BASE_URL,
      secretKey: env.PAYSTACK_SECRET_KEY,
    }),
    generator,
    translator: new LiteLlmTranslator(llmConfig),
    jobLock: new PgAdvisoryJobLock(db),
  };
}

// ============================================================================
// Feature dependency resolution
// ============================================================================

export function resolveSubscriptionDeps(
  container: Container = getContainer()
): SubscriptionDeps {
  return {
    subscriptions: container.subscriptions,
    plans: container.plans,
    graceWindowMs: daysToMs(serverEnv().GRACE_WINDOW_DAYS),
  };
}

export function resolveAskDeps(container: Container = getContainer()): AskDeps {
  const env = serverEnv();
  return {
    gate: {
      subscription: resolveSubscriptionDeps(container),
      ledger: container.ledger,
      usage: container.usage,
      dailyCacheLimitDefault: env.DAILY_CACHE_LIMIT_DEFAULT,
    },
    answers: {
      library: container.library,
      cache: container.cache,
      backlog: container.backlog,
      generator: container.generator,
      generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
      bestEffortTimeoutMs: env.TOUCH_TIMEOUT_MS,
    },
    qaEvents: container.qaEvents,
    autoTrialOnFirstAsk: env.AUTO_TRIAL_ON_FIRST_ASK,
  };
}

export function resolvePaymentDeps(
  container: Container = getContainer()
): PaymentFulfillmentDeps {
  const env = serverEnv();
  return {
    subscription: resolveSubscriptionDeps(container),
    processedPayments: container.processedPayments,
    verifier: container.verifier,
    webhookSecret: env.PAYSTACK_SECRET_KEY,
    verifyTimeoutMs: env.PAYMENT_VERIFY_TIMEOUT_MS,
  };
}

export function resolveTranslationDeps(
  container: Container = getContainer()
): TranslationDrainDeps {
  const env = serverEnv();
  return {
    backlog: container.backlog,
    library: container.library,
    cache: container.cache,
    translator: container.translator,
    translationTimeoutMs: env.TRANSLATION_TIMEOUT_MS,
    batchSize: env.TRANSLATION_BATCH_SIZE,
    maxAttempts: env.TRANSLATION_MAX_ATTEMPTS,
  };
}
