// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/subscription.port`
 * Purpose: Persistence port for append-only subscription records and scheduled plan changes.
 * Scope: Defines the record store contract. Does not derive access state (core rules do).
 * Invariants:
 *   - APPEND_ONLY: activate() inserts a new record; history is never rewritten or deleted
 *   - ACTIVATION_SEEDS_CREDITS: activate() overwrites the credit balance in the same transaction
 *   - APPLY_ONCE: applyPendingChange() inserts the new record and clears the pending fields in one transaction, for exactly one caller
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzleSubscriptionRepository and InMemorySubscriptionRepository
 * @public
 */

import type {
  ActivationSource,
  PendingPlanChange,
  SubscriptionRecord,
  SubscriptionStatus,
} from "@/core/subscriptions/public";

export interface ActivateSubscriptionParams {
  accountId: string;
  planCode: string;
  status: SubscriptionStatus;
  periodStart: Date;
  periodEnd: Date;
  source: ActivationSource;
  providerReference: string | null;
  /** Credit balance to seed (overwrites the previous balance) */
  creditsGranted: number;
  createdAt: Date;
}

export interface SubscriptionRepository {
  /** Record with the latest periodEnd (ties: latest createdAt), or null */
  getCurrent(accountId: string): Promise<SubscriptionRecord | null>;

  /** True if the account has ever had any record (trial eligibility) */
  hasAnyRecord(accountId: string): Promise<boolean>;

  /** Append a new current record and seed the credit balance atomically */
  activate(params: ActivateSubscriptionParams): Promise<SubscriptionRecord>;

  /** Attach a pending plan change to a record */
  setPendingChange(
    recordId: string,
    change: PendingPlanChange
  ): Promise<SubscriptionRecord>;

  /**
   * Apply the record's due pending change in one transaction: lock the record,
   * insert `params` as the new current record, seed credits and clear the
   * pending fields. Writes nothing and returns null when the record no longer
   * carries a pending change for `params.planCode` due at `now`.
   */
  applyPendingChange(
    recordId: string,
    now: Date,
    params: ActivateSubscriptionParams
  ): Promise<SubscriptionRecord | null>;

  updateStatus(recordId: string, status: SubscriptionStatus): Promise<void>;

  /** Accounts whose current record carries a pending change due at `now` */
  listAccountsWithDuePendingChanges(now: Date, limit: number): Promise<string[]>;

  /**
   * Mark expired every non-expired record whose access has fully lapsed:
   * trial/active past periodEnd, past_due/cancelled past periodEnd + grace.
   * Returns the number of records updated.
   */
  expireLapsed(now: Date, graceWindowMs: number): Promise<number>;
}
