// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define full payload schemas.
 * Invariants: All event names registered here; logEvent() enforces base fields (reqId always).
 * Side-effects: none
 * Notes: Use EVENT_NAMES.* constants when logging. Batch jobs pass a job run id as reqId.
 * Links: Used by logEvent() in server/logEvent.ts
 * @public
 */

// ============================================================================
// Event Name Registry (as const)
// ============================================================================

export const EVENT_NAMES = {
  // Ask pipeline
  ASK_RESOLVED: "ask.resolved",
  ASK_DENIED: "ask.denied",
  ASK_GENERATION_FAILED: "ask.generation_failed",
  ASK_CREDIT_REFUNDED: "ask.credit_refunded",
  ASK_TRIAL_STARTED: "ask.trial_started",

  // Subscriptions
  SUBSCRIPTION_ACTIVATED: "subscriptions.activated",
  SUBSCRIPTION_CHANGE_SCHEDULED: "subscriptions.change_scheduled",
  SUBSCRIPTION_SCHEDULED_APPLIED: "subscriptions.scheduled_applied",
  SUBSCRIPTION_STATUS_CHANGED: "subscriptions.status_changed",
  SUBSCRIPTION_SWEEP_COMPLETE: "subscriptions.sweep_complete",

  // Payments
  PAYMENTS_SIGNATURE_REJECTED: "payments.signature_rejected",
  PAYMENTS_EVENT_IGNORED: "payments.event_ignored",
  PAYMENTS_REPLAY: "payments.replay",
  PAYMENTS_VERIFICATION_REJECTED: "payments.verification_rejected",
  PAYMENTS_ACTIVATED: "payments.activated",
  PAYMENTS_SCHEDULED: "payments.scheduled",

  // Translation backlog
  TRANSLATION_JOB_FAILED: "translations.job_failed",
  TRANSLATION_DRAIN_COMPLETE: "translations.drain_complete",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

/**
 * Base fields required on every logEvent() call.
 */
export interface EventBase {
  reqId: string;
  routeId?: string | undefined;
}
