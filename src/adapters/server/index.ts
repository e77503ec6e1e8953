// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server`
 * Purpose: Hex entry file for server adapters - canonical import surface.
 * Scope: Re-exports only public server adapter implementations with named exports. Does not export test doubles or internal utilities.
 * Invariants: Named exports only, no export *, runtime implementations
 * Side-effects: none (at import time - adapters have runtime effects when instantiated)
 * Links: Used by bootstrap layer for DI container assembly
 * @public
 */

export { LiteLlmAnswerGenerator } from "./ai/litellm-answer-generator.adapter";
export { LiteLlmTranslator } from "./ai/litellm-translator.adapter";
export type { LiteLlmConfig } from "./ai/litellm.client";
export {
  DrizzleAnswerCacheRepository,
  DrizzleAnswerLibraryRepository,
} from "./answers/drizzle-answer-store.adapter";
export { DrizzleQaEventLog } from "./answers/drizzle-qa-event.adapter";
export { DrizzleTranslationBacklogRepository } from "./answers/drizzle-translation-backlog.adapter";
export { DrizzleCreditLedger } from "./credits/drizzle-credit-ledger.adapter";
export { DrizzleDailyUsageCounter } from "./credits/drizzle-usage-counter.adapter";
export { closeDb, getDb } from "./db/client";
export { PgAdvisoryJobLock } from "./db/pg-advisory-lock.adapter";
export { DrizzleProcessedPaymentRepository } from "./payments/drizzle-processed-payment.adapter";
export {
  type PaystackConfig,
  PaystackPaymentVerifier,
} from "./payments/paystack-verifier.adapter";
export { DrizzlePlanCatalog } from "./plans/drizzle-plan-catalog.adapter";
export { DrizzleSubscriptionRepository } from "./subscriptions/drizzle-subscription.adapter";
export { SystemClock } from "./time/system.adapter";
