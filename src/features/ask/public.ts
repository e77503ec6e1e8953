// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ask/public`
 * Purpose: Single entrypoint for the ask feature.
 * Scope: Re-exports the ask pipeline, the entitlement gate steps and the answer resolver.
 * Side-effects: none
 * Links: Used by app facades and tests
 * @public
 */

export {
  type AskDeps,
  type AskInput,
  type AskResult,
  askQuestion,
  MAX_QUESTION_LENGTH,
} from "./services/askQuestion";
export {
  admitCacheServe,
  authorize,
  checkSubscription,
  type EntitlementGateDeps,
  releaseCredit,
  reserveCredit,
  type SubscriptionCheck,
} from "./services/entitlementGate";
export {
  type AnswerStoreDeps,
  type ResolveGateHooks,
  type ResolveInput,
  resolveAnswer,
} from "./services/resolveAnswer";
