// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/entitlements/rules`
 * Purpose: Unit tests for credit costs, daily cache limits and UTC day boundaries.
 * Scope: Pure functions. Does NOT test counters or ledgers.
 * Side-effects: none
 * Links: core/entitlements/rules
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  creditCostForMode,
  denialMessage,
  nextUtcMidnight,
  resolveDailyCacheLimit,
  utcDayKey,
} from "@/core/entitlements/public";

describe("core/entitlements/rules", () => {
  it("charges 1 credit for text and 2 for voice", () => {
    expect(creditCostForMode("text")).toBe(1);
    expect(creditCostForMode("voice")).toBe(2);
  });

  describe("resolveDailyCacheLimit", () => {
    it("uses the plan limit when set", () => {
      expect(resolveDailyCacheLimit(50, 1000)).toBe(50);
    });

    it("uses the default when the plan sets none", () => {
      expect(resolveDailyCacheLimit(null, 1000)).toBe(1000);
    });

    it("treats zero or negative as unlimited", () => {
      expect(resolveDailyCacheLimit(0, 1000)).toBeNull();
      expect(resolveDailyCacheLimit(null, -1)).toBeNull();
    });
  });

  describe("UTC day boundaries", () => {
    it("keys the day in UTC", () => {
      expect(utcDayKey(new Date("2025-01-15T23:59:59.999Z"))).toBe("2025-01-15");
      expect(utcDayKey(new Date("2025-01-16T00:00:00.000Z"))).toBe("2025-01-16");
    });

    it("resets at the next UTC midnight, across month ends", () => {
      expect(nextUtcMidnight(new Date("2025-01-31T18:30:00.000Z")).toISOString()).toBe(
        "2025-02-01T00:00:00.000Z"
      );
    });
  });

  it("has a user-facing message per denial", () => {
    expect(denialMessage("no_credits")).toBe(
      "You have used all your AI credits for this plan period. Please renew or upgrade your plan."
    );
  });
});
