// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/subscriptions/drizzle-subscription`
 * Purpose: Drizzle implementation of SubscriptionRepository for PostgreSQL.
 * Scope: Subscription record persistence, pending-change claims and lapse sweeps. Does not derive access state.
 * Invariants:
 * - activate() inserts the record and overwrites the credit balance in one transaction
 * - applyPendingChange() locks the old row (SELECT ... FOR UPDATE), inserts the new record, seeds credits and clears the pending fields in one transaction
 * - A second trial insert for an account violates ONE_TRIAL_INDEX and surfaces as TrialNotEligibleError
 * - expireLapsed() mirrors deriveAccessState: trial/active expire at periodEnd, past_due/cancelled after the grace window
 * Side-effects: IO (database operations)
 * Links: Implements SubscriptionRepository port
 * @public
 */

import { and, desc, eq, inArray, isNotNull, lt, lte, or } from "drizzle-orm";

import type { Database, Transaction } from "@/adapters/server/db/client";
import {
  type PendingPlanChange,
  type SubscriptionRecord,
  type SubscriptionStatus,
  TrialNotEligibleError,
} from "@/core/subscriptions/public";
import type {
  ActivateSubscriptionParams,
  SubscriptionRepository,
} from "@/ports";
import { creditBalances, ONE_TRIAL_INDEX, subscriptions } from "@/shared/db";

type SubscriptionRow = typeof subscriptions.$inferSelect;

const PG_UNIQUE_VIOLATION = "23505";

/** postgres.js errors carry `code` and `constraint_name`; wrappers keep the original on `cause` */
function isUniqueViolationOn(error: unknown, constraint: string): boolean {
  if (typeof error !== "object" || error === null) return false;
  const code = "code" in error ? error.code : undefined;
  const name = "constraint_name" in error ? error.constraint_name : undefined;
  if (code === PG_UNIQUE_VIOLATION && name === constraint) return true;
  return "cause" in error && isUniqueViolationOn(error.cause, constraint);
}

export class DrizzleSubscriptionRepository implements SubscriptionRepository {
  constructor(private readonly db: Database) {}

  async getCurrent(accountId: string): Promise<SubscriptionRecord | null> {
    const [row] = await this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.accountId, accountId))
      .orderBy(desc(subscriptions.periodEnd), desc(subscriptions.createdAt))
      .limit(1);
    return row ? this.mapRow(row) : null;
  }

  async hasAnyRecord(accountId: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: subscriptions.id })
      .from(subscriptions)
      .where(eq(subscriptions.accountId, accountId))
      .limit(1);
    return rows.length > 0;
  }

  async activate(
    params: ActivateSubscriptionParams
  ): Promise<SubscriptionRecord> {
    return await this.mapTrialConflict(params.accountId, () =>
      this.db.transaction((tx) => this.insertAndSeed(tx, params))
    );
  }

  private async mapTrialConflict<T>(
    accountId: string,
    run: () => Promise<T>
  ): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (isUniqueViolationOn(error, ONE_TRIAL_INDEX)) {
        throw new TrialNotEligibleError(accountId);
      }
      throw error;
    }
  }

  private async insertAndSeed(
    tx: Transaction,
    params: ActivateSubscriptionParams
  ): Promise<SubscriptionRecord> {
    const [row] = await tx
      .insert(subscriptions)
      .values({
        accountId: params.accountId,
        planCode: params.planCode,
        status: params.status,
        periodStart: params.periodStart,
        periodEnd: params.periodEnd,
        source: params.source,
        providerReference: params.providerReference,
        createdAt: params.createdAt,
      })
      .returning();

    if (!row) {
      throw new Error("Failed to insert subscription record");
    }

    await tx
      .insert(creditBalances)
      .values({
        accountId: params.accountId,
        balance: params.creditsGranted,
        updatedAt: params.createdAt,
      })
      .onConflictDoUpdate({
        target: creditBalances.accountId,
        set: {
          balance: params.creditsGranted,
          updatedAt: params.createdAt,
        },
      });

    return this.mapRow(row);
  }

  async setPendingChange(
    recordId: string,
    change: PendingPlanChange
  ): Promise<SubscriptionRecord> {
    const [row] = await this.db
      .update(subscriptions)
      .set({
        pendingPlanCode: change.planCode,
        pendingEffectiveAt: change.effectiveAt,
      })
      .where(eq(subscriptions.id, recordId))
      .returning();

    if (!row) {
      throw new Error(`Subscription record not found: ${recordId}`);
    }
    return this.mapRow(row);
  }

  async applyPendingChange(
    recordId: string,
    now: Date,
    params: ActivateSubscriptionParams
  ): Promise<SubscriptionRecord | null> {
    return await this.mapTrialConflict(params.accountId, () =>
      this.db.transaction(async (tx) => {
        const [locked] = await tx
          .select({ id: subscriptions.id })
          .from(subscriptions)
          .where(
            and(
              eq(subscriptions.id, recordId),
              eq(subscriptions.pendingPlanCode, params.planCode),
              lte(subscriptions.pendingEffectiveAt, now)
            )
          )
          .for("update");

        if (!locked) return null;

        const record = await this.insertAndSeed(tx, params);
        await tx
          .update(subscriptions)
          .set({ pendingPlanCode: null, pendingEffectiveAt: null })
          .where(eq(subscriptions.id, recordId));
        return record;
      })
    );
  }

  async updateStatus(
    recordId: string,
    status: SubscriptionStatus
  ): Promise<void> {
    await this.db
      .update(subscriptions)
      .set({ status })
      .where(eq(subscriptions.id, recordId));
  }

  async listAccountsWithDuePendingChanges(
    now: Date,
    limit: number
  ): Promise<string[]> {
    const rows = await this.db
      .selectDistinct({ accountId: subscriptions.accountId })
      .from(subscriptions)
      .where(
        and(
          isNotNull(subscriptions.pendingPlanCode),
          lte(subscriptions.pendingEffectiveAt, now)
        )
      )
      .limit(limit);
    return rows.map((row) => row.accountId);
  }

  async expireLapsed(now: Date, graceWindowMs: number): Promise<number> {
    const graceCutoff = new Date(now.getTime() - graceWindowMs);
    const rows = await this.db
      .update(subscriptions)
      .set({ status: "expired" })
      .where(
        or(
          and(
            inArray(subscriptions.status, ["trial", "active"]),
            lte(subscriptions.periodEnd, now)
          ),
          and(
            inArray(subscriptions.status, ["past_due", "cancelled"]),
            lt(subscriptions.periodEnd, graceCutoff)
          )
        )
      )
      .returning({ id: subscriptions.id });
    return rows.length;
  }

  private mapRow(row: SubscriptionRow): SubscriptionRecord {
    return {
      id: row.id,
      accountId: row.accountId,
      planCode: row.planCode,
      status: row.status,
      periodStart: row.periodStart,
      periodEnd: row.periodEnd,
      pendingPlanCode: row.pendingPlanCode,
      pendingEffectiveAt: row.pendingEffectiveAt,
      source: row.source,
      providerReference: row.providerReference,
      createdAt: row.createdAt,
    };
  }
}
