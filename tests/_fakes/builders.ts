// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/builders`
 * Purpose: Builders for domain rows (plans, subscription records, stored answers, verified transactions) with overridable defaults.
 * Scope: Plain object construction only. Does NOT touch any store.
 * Side-effects: none
 * @public
 */

import type { StoredAnswer } from "@/core/answers/public";
import type { VerifiedTransaction } from "@/core/payments/public";
import type { Plan, SubscriptionRecord } from "@/core/subscriptions/public";
import type { MemoryAnswerRow } from "@/adapters/test";

let seq = 0;
function nextId(prefix: string): string {
  seq++;
  return `${prefix}-${seq}`;
}

export function buildPlan(overrides: Partial<Plan> = {}): Plan {
  return {
    planCode: "monthly",
    name: "Monthly Plan",
    price: 3000,
    currency: "NGN",
    durationDays: 30,
    aiCreditsTotal: 100,
    dailyCacheLimit: null,
    active: true,
    ...overrides,
  };
}

export function buildSubscription(
  overrides: Partial<SubscriptionRecord> = {}
): SubscriptionRecord {
  return {
    id: nextId("sub"),
    accountId: "acct-1",
    planCode: "monthly",
    status: "active",
    periodStart: new Date("2025-01-01T00:00:00.000Z"),
    periodEnd: new Date("2025-01-31T00:00:00.000Z"),
    pendingPlanCode: null,
    pendingEffectiveAt: null,
    source: "payment",
    providerReference: null,
    createdAt: new Date("2025-01-01T00:00:00.000Z"),
    ...overrides,
  };
}

export function buildStoredAnswer(
  overrides: Partial<StoredAnswer> = {}
): StoredAnswer {
  return {
    id: nextId("ans"),
    tier: "library",
    canonicalKey: "vat|any|lagos|any",
    normalizedQuestion: "what is the vat rate in lagos",
    lang: "en",
    answer: "VAT is charged at the federal rate.",
    priority: 0,
    enabledAt: new Date("2025-01-01T00:00:00.000Z"),
    lastUsedAt: null,
    useCount: 0,
    ...overrides,
  };
}

/** Library row for MemoryStore.library */
export function buildLibraryRow(
  overrides: Partial<MemoryAnswerRow> = {}
): MemoryAnswerRow {
  return {
    ...buildStoredAnswer({ tier: "library" }),
    enabled: true,
    source: null,
    ...overrides,
  };
}

/** Cache row for MemoryStore.cache */
export function buildCacheRow(
  overrides: Partial<MemoryAnswerRow> = {}
): MemoryAnswerRow {
  return {
    ...buildStoredAnswer({ tier: "cache" }),
    enabled: true,
    source: "ai",
    ...overrides,
  };
}

export function buildTransaction(
  overrides: Partial<VerifiedTransaction> = {}
): VerifiedTransaction {
  return {
    reference: "ref-1",
    status: "success",
    amount: 300_000,
    currency: "NGN",
    paidAt: new Date("2025-01-15T08:59:00.000Z"),
    metadata: { account_id: "acct-1", plan_code: "monthly" },
    ...overrides,
  };
}
