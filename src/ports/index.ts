// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Hex entry file for port interfaces and port-level errors - canonical import surface.
 * Scope: Re-exports public port interfaces and error classes. Does not export implementations or runtime objects.
 * Invariants: Named exports only, no runtime coupling except error classes, no export *
 * Side-effects: none
 * Links: Used by features and adapters for port contracts
 * @public
 */

export {
  type AnswerGenerator,
  classifyLlmErrorFromStatus,
  type GeneratedAnswer,
  type GenerateAnswerParams,
  isLlmError,
  LlmError,
  type LlmErrorKind,
  type TranslateParams,
  type Translator,
} from "./answer-generator.port";
export type {
  AnswerCacheRepository,
  AnswerLibraryRepository,
  AnswerReader,
} from "./answer-store.port";
export type { Clock } from "./clock.port";
export {
  type CreditLedger,
  InsufficientCreditsPortError,
  isInsufficientCreditsPortError,
} from "./credit-ledger.port";
export {
  isPaymentProviderError,
  PaymentProviderError,
  type PaymentVerifier,
} from "./payment-provider.port";
export type { ExclusiveRun, JobLock } from "./job-lock.port";
export type { PlanCatalog } from "./plan-catalog.port";
export type {
  PaymentSettlement,
  ProcessedPaymentRepository,
} from "./processed-payment.port";
export type { QaEvent, QaEventLog, QaOutcome } from "./qa-event.port";
export type {
  ActivateSubscriptionParams,
  SubscriptionRepository,
} from "./subscription.port";
export type { TranslationBacklogRepository } from "./translation-backlog.port";
export type { DailyUsageCounter, UsageAdmission } from "./usage-counter.port";
