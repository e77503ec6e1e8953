// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/subscriptions/errors`
 * Purpose: Domain errors for plan activation, trials and scheduled plan changes.
 * Scope: Error classes and type guards. Does not handle HTTP mapping.
 * Invariants: Each error carries a stable readonly code.
 * Side-effects: none
 * Links: Used by subscription feature services and route handlers
 * @public
 */

export class UnknownPlanError extends Error {
  readonly code = "UNKNOWN_PLAN" as const;

  constructor(public readonly planCode: string) {
    super(`Unknown plan: ${planCode}`);
    this.name = "UnknownPlanError";
  }
}

export class TrialNotEligibleError extends Error {
  readonly code = "TRIAL_NOT_ELIGIBLE" as const;

  constructor(public readonly accountId: string) {
    super(`Account ${accountId} already has a subscription history`);
    this.name = "TrialNotEligibleError";
  }
}

export class NoCurrentSubscriptionError extends Error {
  readonly code = "NO_CURRENT_SUBSCRIPTION" as const;

  constructor(public readonly accountId: string) {
    super(`Account ${accountId} has no subscription to change`);
    this.name = "NoCurrentSubscriptionError";
  }
}

export class InvalidPeriodError extends Error {
  readonly code = "INVALID_PERIOD" as const;

  constructor(
    public readonly periodStart: Date,
    public readonly periodEnd: Date
  ) {
    super(
      `Period end ${periodEnd.toISOString()} must be after start ${periodStart.toISOString()}`
    );
    this.name = "InvalidPeriodError";
  }
}

export function isUnknownPlanError(error: unknown): error is UnknownPlanError {
  return error instanceof Error && error.name === "UnknownPlanError";
}

export function isTrialNotEligibleError(
  error: unknown
): error is TrialNotEligibleError {
  return error instanceof Error && error.name === "TrialNotEligibleError";
}

export function isNoCurrentSubscriptionError(
  error: unknown
): error is NoCurrentSubscriptionError {
  return error instanceof Error && error.name === "NoCurrentSubscriptionError";
}

export function isInvalidPeriodError(
  error: unknown
): error is InvalidPeriodError {
  return error instanceof Error && error.name === "InvalidPeriodError";
}
