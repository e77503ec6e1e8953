// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/credits/drizzle-credit-ledger`
 * Purpose: Drizzle implementation of CreditLedger over credit_balances.
 * Scope: Conditional single-statement debit and additive refund. Does not decide costs.
 * Invariants: debit is `UPDATE ... SET balance = balance - cost WHERE balance >= cost RETURNING`; balance never goes negative.
 * Side-effects: IO (database operations)
 * Links: Implements CreditLedger port
 * @public
 */

import { and, eq, gte, sql } from "drizzle-orm";

import type { Database } from "@/adapters/server/db/client";
import { type CreditLedger, InsufficientCreditsPortError } from "@/ports";
import { creditBalances } from "@/shared/db";

export class DrizzleCreditLedger implements CreditLedger {
  constructor(private readonly db: Database) {}

  async getBalance(accountId: string): Promise<number> {
    const [row] = await this.db
      .select({ balance: creditBalances.balance })
      .from(creditBalances)
      .where(eq(creditBalances.accountId, accountId))
      .limit(1);
    return row?.balance ?? 0;
  }

  async debit(accountId: string, cost: number): Promise<number> {
    const [row] = await this.db
      .update(creditBalances)
      .set({
        balance: sql`${creditBalances.balance} - ${cost}`,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(creditBalances.accountId, accountId),
          gte(creditBalances.balance, cost)
        )
      )
      .returning({ balance: creditBalances.balance });

    if (!row) {
      const previousBalance = await this.getBalance(accountId);
      throw new InsufficientCreditsPortError(accountId, cost, previousBalance);
    }
    return row.balance;
  }

  async refund(accountId: string, amount: number): Promise<number> {
    const [row] = await this.db
      .insert(creditBalances)
      .values({ accountId, balance: amount, updatedAt: new Date() })
      .onConflictDoUpdate({
        target: creditBalances.accountId,
        set: {
          balance: sql`${creditBalances.balance} + ${amount}`,
          updatedAt: new Date(),
        },
      })
      .returning({ balance: creditBalances.balance });

    if (!row) {
      throw new Error(`Failed to refund credits for account ${accountId}`);
    }
    return row.balance;
  }
}
