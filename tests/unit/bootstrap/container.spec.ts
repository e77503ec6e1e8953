// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Unit tests for dependency injection container environment-based adapter wiring.
 * Scope: Tests adapter selection based on APP_ENV and feature deps resolution. Does NOT test adapter implementations.
 * Invariants: Clean env state per test; production wiring opens no database connection at construction.
 * Side-effects: process.env
 * Links: src/bootstrap/container.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  closeDb,
  DrizzleSubscriptionRepository,
  LiteLlmAnswerGenerator,
  PaystackPaymentVerifier,
  PgAdvisoryJobLock,
  SystemClock,
} from "@/adapters/server";
import {
  FakeAnswerGenerator,
  FakePaymentVerifier,
  getTestMemoryStore,
  ManualClock,
  MemoryJobLock,
  MemorySubscriptionRepository,
} from "@/adapters/test";
import {
  getContainer,
  resetContainer,
  resolveAskDeps,
  resolvePaymentDeps,
  resolveSubscriptionDeps,
  resolveTranslationDeps,
} from "@/bootstrap/container";
import { resetServerEnv } from "@/shared/env";

const ORIGINAL_ENV = { ...process.env };

function useEnv(overrides: Record<string, string | undefined>): void {
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  resetServerEnv();
  resetContainer();
}

describe("bootstrap container DI wiring", () => {
  beforeEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  afterEach(async () => {
    resetContainer();
    await closeDb();
    process.env = { ...ORIGINAL_ENV };
    resetServerEnv();
  });

  describe("getContainer adapter selection", () => {
    it("wires memory adapters and fakes when APP_ENV=test", () => {
      const container = getContainer();

      expect(container.subscriptions).toBeInstanceOf(MemorySubscriptionRepository);
      expect(container.generator).toBeInstanceOf(FakeAnswerGenerator);
      expect(container.verifier).toBeInstanceOf(FakePaymentVerifier);
      expect(container.clock).toBeInstanceOf(ManualClock);
      expect(container.jobLock).toBeInstanceOf(MemoryJobLock);
      expect(container.config.unhandledErrorPolicy).toBe("rethrow");
    });

    it("shares the test memory store with direct seeding", async () => {
      getTestMemoryStore().creditBalances.set("acct-1", 7);
      expect(await getContainer().ledger.getBalance("acct-1")).toBe(7);
    });

    it("returns the same instance until reset", () => {
      const first = getContainer();
      expect(getContainer()).toBe(first);
      resetContainer();
      expect(getContainer()).not.toBe(first);
    });

    it("wires Postgres, LiteLLM and Paystack adapters when APP_ENV=production", () => {
      useEnv({ APP_ENV: "production" });

      const container = getContainer();

      expect(container.subscriptions).toBeInstanceOf(DrizzleSubscriptionRepository);
      expect(container.generator).toBeInstanceOf(LiteLlmAnswerGenerator);
      expect(container.verifier).toBeInstanceOf(PaystackPaymentVerifier);
      expect(container.clock).toBeInstanceOf(SystemClock);
      expect(container.jobLock).toBeInstanceOf(PgAdvisoryJobLock);
    });

    it("disables generation outside production when no gateway key is set", () => {
      useEnv({ APP_ENV: "production", LITELLM_MASTER_KEY: undefined });
      expect(getContainer().generator).toBeNull();
    });

    it("keeps the generator in production even without a key", () => {
      useEnv({
        APP_ENV: "production",
        NODE_ENV: "production",
        LITELLM_MASTER_KEY: undefined,
      });
      const container = getContainer();
      expect(container.generator).toBeInstanceOf(LiteLlmAnswerGenerator);
      expect(container.config.unhandledErrorPolicy).toBe("respond_500");
    });
  });

  describe("feature deps", () => {
    it("derives settings from the environment", () => {
      useEnv({
        GRACE_WINDOW_DAYS: "2",
        DAILY_CACHE_LIMIT_DEFAULT: "10",
        AUTO_TRIAL_ON_FIRST_ASK: "false",
        TRANSLATION_BATCH_SIZE: "5",
      });

      expect(resolveSubscriptionDeps().graceWindowMs).toBe(2 * 24 * 60 * 60 * 1000);

      const ask = resolveAskDeps();
      expect(ask.gate.dailyCacheLimitDefault).toBe(10);
      expect(ask.autoTrialOnFirstAsk).toBe(false);

      expect(resolvePaymentDeps().webhookSecret).toBe("test-secret");
      expect(resolveTranslationDeps()).toMatchObject({ batchSize: 5, maxAttempts: 3 });
    });
  });
});
