// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/credit-ledger.port`
 * Purpose: Per-account AI credit balance with atomic debit and refund.
 * Scope: Defines the balance contract and port-level errors. Does not seed balances (activation does).
 * Invariants:
 *   - ATOMIC_DEBIT: debit is a single conditional store operation (balance >= cost); never read-then-write
 *   - NEVER_NEGATIVE: a failed debit leaves the balance unchanged
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzleCreditLedger and InMemoryCreditLedger
 * @public
 */

/**
 * Port-level error thrown when a debit would drive the balance below zero.
 */
export class InsufficientCreditsPortError extends Error {
  constructor(
    public readonly accountId: string,
    public readonly cost: number,
    public readonly previousBalance: number
  ) {
    super(
      `Insufficient credits for account ${accountId}: need ${cost}, have ${previousBalance}`
    );
    this.name = "InsufficientCreditsPortError";
  }
}

export function isInsufficientCreditsPortError(
  error: unknown
): error is InsufficientCreditsPortError {
  return (
    error instanceof Error && error.name === "InsufficientCreditsPortError"
  );
}

export interface CreditLedger {
  /** Current balance; 0 when the account has no balance row */
  getBalance(accountId: string): Promise<number>;

  /**
   * Atomically subtract `cost`.
   * @returns balance after the debit
   * @throws InsufficientCreditsPortError when balance < cost (balance unchanged)
   */
  debit(accountId: string, cost: number): Promise<number>;

  /**
   * Atomically add `amount` back (refund of a released reservation).
   * @returns balance after the credit
   */
  refund(accountId: string, amount: number): Promise<number>;
}
