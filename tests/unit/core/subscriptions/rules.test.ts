// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/subscriptions/rules`
 * Purpose: Unit tests for the derived access state machine, current-record selection and plan catalog defaults.
 * Scope: Pure business logic. Does NOT test repositories.
 * Invariants: Grace applies only to past_due/cancelled; graceUntil is inclusive; a marked-expired record never grants access.
 * Side-effects: none
 * Links: core/subscriptions/rules, core/subscriptions/plans
 * @public
 */

import { buildSubscription } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import {
  computePeriodEnd,
  DAY_MS,
  DEFAULT_PLANS,
  deriveAccessState,
  findDefaultPlan,
  grantsAccess,
  initialStatusFor,
  isLapsedBeyondAccess,
  isPendingChangeDue,
  isTrialEligible,
  selectCurrentRecord,
} from "@/core/subscriptions/public";

const GRACE = 5 * DAY_MS;
const at = (iso: string) => new Date(iso);

describe("core/subscriptions/rules", () => {
  describe("deriveAccessState", () => {
    it("is expired with no_subscription when there is no record", () => {
      expect(deriveAccessState(null, at("2025-01-15T00:00:00.000Z"), GRACE)).toEqual({
        state: "expired",
        active: false,
        reason: "no_subscription",
        planCode: null,
        expiresAt: null,
        graceUntil: null,
        pending: null,
      });
    });

    it("is active within the period", () => {
      const record = buildSubscription();
      expect(deriveAccessState(record, at("2025-01-15T00:00:00.000Z"), GRACE)).toEqual({
        state: "active",
        active: true,
        reason: "within_period",
        planCode: "monthly",
        expiresAt: at("2025-01-31T00:00:00.000Z"),
        graceUntil: null,
        pending: null,
      });
    });

    it("reports trial for trial records", () => {
      const record = buildSubscription({ planCode: "trial", status: "trial" });
      expect(deriveAccessState(record, at("2025-01-15T00:00:00.000Z"), GRACE).state).toBe(
        "trial"
      );
    });

    it("never grants access to a record marked expired", () => {
      const record = buildSubscription({ status: "expired" });
      const status = deriveAccessState(record, at("2025-01-15T00:00:00.000Z"), GRACE);
      expect(status.state).toBe("expired");
      expect(status.reason).toBe("marked_expired");
    });

    it("does not grant access before the period starts", () => {
      const record = buildSubscription();
      expect(
        deriveAccessState(record, at("2024-12-31T23:59:59.000Z"), GRACE).reason
      ).toBe("not_started");
    });

    it("ends an active record exactly at periodEnd with no grace", () => {
      const record = buildSubscription();
      const status = deriveAccessState(record, at("2025-01-31T00:00:00.000Z"), GRACE);
      expect(status.state).toBe("expired");
      expect(status.reason).toBe("period_ended");
      expect(status.graceUntil).toBeNull();
    });

    it("gives past_due records a grace window, inclusive at its end", () => {
      const record = buildSubscription({ status: "past_due" });

      const inside = deriveAccessState(record, at("2025-02-03T00:00:00.000Z"), GRACE);
      expect(inside.state).toBe("grace");
      expect(inside.active).toBe(true);
      expect(inside.graceUntil).toEqual(at("2025-02-05T00:00:00.000Z"));

      expect(
        deriveAccessState(record, at("2025-02-05T00:00:00.000Z"), GRACE).state
      ).toBe("grace");

      const after = deriveAccessState(record, at("2025-02-05T00:00:00.001Z"), GRACE);
      expect(after.state).toBe("expired");
      expect(after.reason).toBe("grace_ended");
      expect(after.graceUntil).toEqual(at("2025-02-05T00:00:00.000Z"));
    });

    it("gives cancelled records the same grace window", () => {
      const record = buildSubscription({ status: "cancelled" });
      expect(
        deriveAccessState(record, at("2025-02-01T00:00:00.000Z"), GRACE).reason
      ).toBe("within_grace");
    });

    it("includes the pending plan change", () => {
      const record = buildSubscription({
        pendingPlanCode: "yearly",
        pendingEffectiveAt: at("2025-01-31T00:00:00.000Z"),
      });
      expect(deriveAccessState(record, at("2025-01-15T00:00:00.000Z"), GRACE).pending).toEqual({
        planCode: "yearly",
        effectiveAt: at("2025-01-31T00:00:00.000Z"),
      });
    });
  });

  describe("selectCurrentRecord", () => {
    it("picks the latest periodEnd", () => {
      const early = buildSubscription({ id: "early" });
      const late = buildSubscription({
        id: "late",
        periodEnd: at("2025-03-01T00:00:00.000Z"),
      });
      expect(selectCurrentRecord([late, early])?.id).toBe("late");
    });

    it("breaks periodEnd ties by latest createdAt", () => {
      const first = buildSubscription({ id: "first" });
      const second = buildSubscription({
        id: "second",
        createdAt: at("2025-01-02T00:00:00.000Z"),
      });
      expect(selectCurrentRecord([first, second])?.id).toBe("second");
    });

    it("returns null for no records", () => {
      expect(selectCurrentRecord([])).toBeNull();
    });
  });

  describe("pending changes and lapse", () => {
    it("is due at or after effectiveAt", () => {
      const record = buildSubscription({
        pendingPlanCode: "yearly",
        pendingEffectiveAt: at("2025-01-31T00:00:00.000Z"),
      });
      expect(isPendingChangeDue(record, at("2025-01-30T23:59:59.999Z"))).toBe(false);
      expect(isPendingChangeDue(record, at("2025-01-31T00:00:00.000Z"))).toBe(true);
      expect(isPendingChangeDue(buildSubscription(), at("2025-02-01T00:00:00.000Z"))).toBe(
        false
      );
    });

    it("treats only non-expired records past access as lapsed", () => {
      const after = at("2025-02-01T00:00:00.000Z");
      expect(isLapsedBeyondAccess(buildSubscription(), after, GRACE)).toBe(true);
      expect(
        isLapsedBeyondAccess(buildSubscription({ status: "past_due" }), after, GRACE)
      ).toBe(false);
      expect(
        isLapsedBeyondAccess(buildSubscription({ status: "expired" }), after, GRACE)
      ).toBe(false);
    });
  });

  describe("helpers", () => {
    it("adds whole days to compute the period end", () => {
      expect(computePeriodEnd(at("2025-01-15T09:00:00.000Z"), 7)).toEqual(
        at("2025-01-22T09:00:00.000Z")
      );
    });

    it("grants access for trial, active and grace only", () => {
      expect(grantsAccess("trial")).toBe(true);
      expect(grantsAccess("grace")).toBe(true);
      expect(grantsAccess("expired")).toBe(false);
    });

    it("allows one trial per lifetime", () => {
      expect(isTrialEligible(false)).toBe(true);
      expect(isTrialEligible(true)).toBe(false);
    });

    it("starts trial plans in trial status", () => {
      expect(initialStatusFor("trial", "trial")).toBe("trial");
      expect(initialStatusFor("monthly", "trial")).toBe("active");
    });
  });

  describe("default plans", () => {
    it("ships the built-in catalog", () => {
      expect(DEFAULT_PLANS.map((p) => p.planCode)).toEqual([
        "trial",
        "monthly",
        "quarterly",
        "yearly",
        "manual",
      ]);
    });

    it("finds plans case-insensitively", () => {
      expect(findDefaultPlan("  Monthly ")).toMatchObject({
        planCode: "monthly",
        price: 3000,
        durationDays: 30,
        aiCreditsTotal: 100,
      });
      expect(findDefaultPlan("gold")).toBeNull();
    });
  });
});
