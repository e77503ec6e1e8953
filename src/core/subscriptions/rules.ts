// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/subscriptions/rules`
 * Purpose: Subscription state machine rules: access-state derivation, period arithmetic, scheduled-change due checks.
 * Scope: Pure functions with injected `now`. Does not perform I/O or mutate records.
 * Invariants:
 *   - ACTIVE_WINDOW: periodStart <= now < periodEnd grants access (trial/active)
 *   - GRACE_ONLY_AFTER_LAPSE: grace applies only when the stored status is past_due or cancelled, for periodEnd <= now <= periodEnd + grace window
 *   - NO_RECORD_IS_EXPIRED: absence of a record derives to expired (reason no_subscription)
 *   - ZERO_GAP: a scheduled plan starts exactly at the previous periodEnd
 * Side-effects: none
 * Notes: past_due and cancelled keep access until periodEnd; grace covers the lapse after it.
 * Links: model.ts, features/subscriptions/services
 * @public
 */

import type {
  AccessState,
  AccessStatus,
  PendingPlanChange,
  SubscriptionRecord,
  SubscriptionStatus,
} from "./model";

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Default grace window after a lapsed period */
export const DEFAULT_GRACE_WINDOW_DAYS = 5;

export function daysToMs(days: number): number {
  return days * DAY_MS;
}

export function computePeriodEnd(periodStart: Date, durationDays: number): Date {
  return new Date(periodStart.getTime() + daysToMs(durationDays));
}

export function grantsAccess(state: AccessState): boolean {
  return state === "trial" || state === "active" || state === "grace";
}

/** Statuses that mean "was paying, payment lapsed" */
export function isGraceEligibleStatus(status: SubscriptionStatus): boolean {
  return status === "past_due" || status === "cancelled";
}

/**
 * Pick the current record: latest periodEnd, ties broken by latest createdAt.
 */
export function selectCurrentRecord(
  records: readonly SubscriptionRecord[]
): SubscriptionRecord | null {
  let current: SubscriptionRecord | null = null;
  for (const record of records) {
    if (
      !current ||
      record.periodEnd.getTime() > current.periodEnd.getTime() ||
      (record.periodEnd.getTime() === current.periodEnd.getTime() &&
        record.createdAt.getTime() > current.createdAt.getTime())
    ) {
      current = record;
    }
  }
  return current;
}

function pendingOf(record: SubscriptionRecord): PendingPlanChange | null {
  if (!record.pendingPlanCode || !record.pendingEffectiveAt) return null;
  return {
    planCode: record.pendingPlanCode,
    effectiveAt: record.pendingEffectiveAt,
  };
}

/**
 * Derive the access state of an account from its current record.
 */
export function deriveAccessState(
  record: SubscriptionRecord | null,
  now: Date,
  graceWindowMs: number
): AccessStatus {
  if (!record) {
    return {
      state: "expired",
      active: false,
      reason: "no_subscription",
      planCode: null,
      expiresAt: null,
      graceUntil: null,
      pending: null,
    };
  }

  const base = {
    planCode: record.planCode,
    expiresAt: record.periodEnd,
    pending: pendingOf(record),
  };
  const t = now.getTime();

  if (record.status === "expired") {
    return {
      ...base,
      state: "expired",
      active: false,
      reason: "marked_expired",
      graceUntil: null,
    };
  }

  if (t < record.periodStart.getTime()) {
    return {
      ...base,
      state: "expired",
      active: false,
      reason: "not_started",
      graceUntil: null,
    };
  }

  if (t < record.periodEnd.getTime()) {
    const state: AccessState = record.status === "trial" ? "trial" : "active";
    return {
      ...base,
      state,
      active: true,
      reason: "within_period",
      graceUntil: null,
    };
  }

  if (isGraceEligibleStatus(record.status)) {
    const graceUntil = new Date(record.periodEnd.getTime() + graceWindowMs);
    if (t <= graceUntil.getTime()) {
      return {
        ...base,
        state: "grace",
        active: true,
        reason: "within_grace",
        graceUntil,
      };
    }
    return {
      ...base,
      state: "expired",
      active: false,
      reason: "grace_ended",
      graceUntil,
    };
  }

  return {
    ...base,
    state: "expired",
    active: false,
    reason: "period_ended",
    graceUntil: null,
  };
}

export function isPendingChangeDue(
  record: SubscriptionRecord,
  now: Date
): boolean {
  return (
    record.pendingPlanCode !== null &&
    record.pendingEffectiveAt !== null &&
    now.getTime() >= record.pendingEffectiveAt.getTime()
  );
}

/**
 * True when a non-expired record has run past every window that grants access
 * and should be marked expired by the sweep.
 */
export function isLapsedBeyondAccess(
  record: SubscriptionRecord,
  now: Date,
  graceWindowMs: number
): boolean {
  if (record.status === "expired") return false;
  return deriveAccessState(record, now, graceWindowMs).state === "expired";
}

/** One trial per lifetime: eligible only when no record has ever existed. */
export function isTrialEligible(hasAnyRecord: boolean): boolean {
  return !hasAnyRecord;
}

/** Status for a freshly activated record of the given plan */
export function initialStatusFor(
  planCode: string,
  trialPlanCode: string
): SubscriptionStatus {
  return planCode === trialPlanCode ? "trial" : "active";
}
