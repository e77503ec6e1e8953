// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/payments/rules`
 * Purpose: Unit tests for payment metadata extraction and verified-transaction checks.
 * Scope: Pure business logic testing. Does NOT test external dependencies or I/O.
 * Invariants: Amounts compare in minor units; currency compares case-insensitively; a stale claim is at least 5 minutes old.
 * Side-effects: none
 * Links: core/payments/rules
 * @public
 */

import { buildTransaction } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import {
  checkPaidAmount,
  checkVerifiedTransaction,
  extractPaymentMetadata,
  isClaimStale,
  isPaymentMetadataError,
  PaymentMetadataError,
  STALE_CLAIM_MS,
} from "@/core/payments/public";

describe("core/payments/rules", () => {
  describe("extractPaymentMetadata", () => {
    it("reads snake_case fields", () => {
      expect(
        extractPaymentMetadata("ref-1", {
          account_id: "acct-1",
          plan_code: "Monthly",
          upgrade_mode: "at_expiry",
          email: "user@example.com",
          wa_phone: "2348000000000",
        })
      ).toEqual({
        accountId: "acct-1",
        planCode: "monthly",
        upgradeMode: "at_expiry",
        email: "user@example.com",
        waPhone: "2348000000000",
      });
    });

    it("reads camelCase aliases and a JSON string", () => {
      expect(
        extractPaymentMetadata(
          "ref-1",
          JSON.stringify({ accountId: "acct-2", plan: "yearly", upgradeMode: "upgrade_at_expiry" })
        )
      ).toEqual({
        accountId: "acct-2",
        planCode: "yearly",
        upgradeMode: "at_expiry",
        email: null,
        waPhone: null,
      });
    });

    it("defaults the upgrade mode to now", () => {
      expect(
        extractPaymentMetadata("ref-1", { account_id: "acct-1", plan_code: "monthly" })
          .upgradeMode
      ).toBe("now");
    });

    it("throws missing_account before missing_plan", () => {
      try {
        extractPaymentMetadata("ref-1", {});
        expect.unreachable();
      } catch (error) {
        expect(isPaymentMetadataError(error)).toBe(true);
        expect(error).toBeInstanceOf(PaymentMetadataError);
        if (isPaymentMetadataError(error)) {
          expect(error.reason).toBe("missing_account");
        }
      }
    });

    it("throws missing_plan when only the account is present", () => {
      expect(() => extractPaymentMetadata("ref-1", { account_id: "acct-1" })).toThrow(
        "Payment ref-1 metadata invalid: missing_plan"
      );
    });

    it("treats non-object metadata as empty", () => {
      expect(() => extractPaymentMetadata("ref-1", "not json")).toThrow(
        "missing_account"
      );
    });
  });

  describe("checkVerifiedTransaction", () => {
    it("accepts a successful transaction for the same reference", () => {
      expect(checkVerifiedTransaction("ref-1", buildTransaction())).toBeNull();
    });

    it("rejects a provider status other than success", () => {
      expect(
        checkVerifiedTransaction("ref-1", buildTransaction({ status: "abandoned" }))
      ).toBe("provider_not_successful");
    });

    it("rejects a different reference", () => {
      expect(
        checkVerifiedTransaction("ref-1", buildTransaction({ reference: "ref-2" }))
      ).toBe("reference_mismatch");
    });
  });

  describe("checkPaidAmount", () => {
    const plan = { price: 3000, currency: "NGN" };

    it("accepts the full price in minor units", () => {
      expect(checkPaidAmount(plan, { amount: 300_000, currency: "ngn" })).toBeNull();
    });

    it("rejects an underpayment", () => {
      expect(checkPaidAmount(plan, { amount: 299_999, currency: "NGN" })).toBe(
        "amount_mismatch"
      );
    });

    it("rejects another currency before checking the amount", () => {
      expect(checkPaidAmount(plan, { amount: 1, currency: "USD" })).toBe(
        "currency_mismatch"
      );
    });

    it("rejects plans without a price whatever was paid", () => {
      const free = { price: 0, currency: "NGN" };
      expect(checkPaidAmount(free, { amount: 0, currency: "NGN" })).toBe("plan_not_purchasable");
      expect(checkPaidAmount(free, { amount: 300_000, currency: "NGN" })).toBe(
        "plan_not_purchasable"
      );
    });
  });

  it("considers a claim stale after five minutes", () => {
    const now = new Date("2025-01-15T09:00:00.000Z");
    expect(isClaimStale(new Date(now.getTime() - STALE_CLAIM_MS), now)).toBe(true);
    expect(isClaimStale(new Date(now.getTime() - STALE_CLAIM_MS + 1), now)).toBe(false);
  });
});
