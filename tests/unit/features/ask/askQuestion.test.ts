// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ask/services/askQuestion`
 * Purpose: Unit tests for the ask pipeline: tier order, entitlement charging, fallback, refunds and telemetry rows.
 * Scope: Full pipeline over the in-memory store and fake generator. Does NOT test HTTP mapping.
 * Invariants:
 *   - Library answers are free; Cache answers count against the daily quota; AI answers cost credits
 *   - A failed generation refunds its credit
 *   - Concurrent requests never overspend credits or quota
 * Side-effects: none
 * Links: src/features/ask/services/askQuestion.ts
 * @public
 */

import {
  buildCacheRow,
  buildLibraryRow,
  buildSubscription,
  FakeClock,
  makeMemoryHarness,
  makeTestCtx,
} from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { usageKey } from "@/adapters/test";
import { DAY_MS } from "@/core/subscriptions/public";
import { askQuestion } from "@/features/ask/public";
import { getSubscriptionStatus } from "@/features/subscriptions/public";

const NOW = "2025-01-15T09:00:00.000Z";
const TODAY = "2025-01-15";
const VAT_LAGOS = "vat|any|lagos|any";

function withActiveMonthly(harness: ReturnType<typeof makeMemoryHarness>, credits = 100) {
  harness.store.subscriptions.push(buildSubscription({ accountId: "acct-1" }));
  harness.store.creditBalances.set("acct-1", credits);
  return harness;
}

const textAsk = (question: string, language?: string) => ({
  accountId: "acct-1",
  question,
  language,
  mode: "text" as const,
});

describe("features/ask/askQuestion", () => {
  describe("tier order", () => {
    it("serves a Library answer without touching quota or credits", async () => {
      const h = withActiveMonthly(makeMemoryHarness());
      h.store.library.push(buildLibraryRow({ id: "lib-1", canonicalKey: VAT_LAGOS, answer: "Library VAT answer" }));

      const result = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toEqual({
        ok: true,
        answer: "Library VAT answer",
        source: "library",
        language: "en",
        fallbackUsed: false,
      });
      expect(h.store.dailyUsage.size).toBe(0);
      expect(h.store.creditBalances.get("acct-1")).toBe(100);
      expect(h.store.library[0]?.useCount).toBe(1);
      expect(h.store.library[0]?.lastUsedAt).toEqual(new Date(NOW));
      expect(h.generator.calls).toHaveLength(0);
      expect(h.store.qaEvents[0]).toMatchObject({ channel: null, source: "library" });
    });

    it("records the channel a question came through", async () => {
      const h = withActiveMonthly(makeMemoryHarness());
      h.store.library.push(buildLibraryRow({ canonicalKey: VAT_LAGOS }));

      await askQuestion(
        h.ask,
        { ...textAsk("What is the VAT rate in Lagos?"), channel: "whatsapp" },
        makeTestCtx({ clockTime: NOW })
      );

      expect(h.store.qaEvents).toHaveLength(1);
      expect(h.store.qaEvents[0]).toMatchObject({
        channel: "whatsapp",
        outcome: "ok",
        source: "library",
      });
    });

    it("prefers the Library over the Cache for the same key", async () => {
      const h = withActiveMonthly(makeMemoryHarness());
      h.store.cache.push(buildCacheRow({ canonicalKey: VAT_LAGOS, answer: "cached" }));
      h.store.library.push(buildLibraryRow({ canonicalKey: VAT_LAGOS, answer: "curated" }));

      const result = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toMatchObject({ ok: true, answer: "curated", source: "library" });
    });

    it("serves a Cache answer and counts it against today's quota", async () => {
      const h = withActiveMonthly(makeMemoryHarness());
      h.store.cache.push(buildCacheRow({ canonicalKey: VAT_LAGOS, answer: "cached" }));

      const result = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toMatchObject({ ok: true, answer: "cached", source: "cache" });
      expect(h.store.dailyUsage.get(usageKey("acct-1", TODAY))).toBe(1);
      expect(h.store.creditBalances.get("acct-1")).toBe(100);
    });

    it("generates on a miss, spends one credit and caches the answer", async () => {
      const h = withActiveMonthly(makeMemoryHarness());

      const result = await askQuestion(
        h.ask,
        textAsk("  What is the VAT rate in Lagos?  "),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toEqual({
        ok: true,
        answer: "[FAKE_ANSWER] What is the VAT rate in Lagos?",
        source: "ai",
        language: "en",
        fallbackUsed: false,
      });
      expect(h.generator.calls).toEqual([
        { question: "What is the VAT rate in Lagos?", language: "en" },
      ]);
      expect(h.store.creditBalances.get("acct-1")).toBe(99);
      expect(h.store.cache).toHaveLength(1);
      expect(h.store.cache[0]).toMatchObject({
        canonicalKey: VAT_LAGOS,
        lang: "en",
        source: "ai",
        normalizedQuestion: "what is the vat rate in lagos",
      });
      expect(
        h.store.translationJobs.map((job) => [job.targetLang, job.sourceTable])
      ).toEqual([
        ["yo", "cache"],
        ["ig", "cache"],
        ["ha", "cache"],
        ["pcm", "cache"],
      ]);
    });

    it("charges two credits for voice", async () => {
      const h = withActiveMonthly(makeMemoryHarness());

      await askQuestion(
        h.ask,
        { ...textAsk("What is the VAT rate in Lagos?"), mode: "voice" },
        makeTestCtx({ clockTime: NOW })
      );

      expect(h.store.creditBalances.get("acct-1")).toBe(98);
    });

    it("stores keyless questions by normalized text and skips translation", async () => {
      const h = withActiveMonthly(makeMemoryHarness());

      await askQuestion(h.ask, textAsk("Hello there!"), makeTestCtx({ clockTime: NOW }));

      expect(h.store.cache[0]).toMatchObject({
        canonicalKey: null,
        normalizedQuestion: "hello there",
      });
      expect(h.store.translationJobs).toHaveLength(0);
    });

    it("returns not_found when no generator is configured", async () => {
      const h = withActiveMonthly(makeMemoryHarness({ withGenerator: false }));

      const result = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toEqual({
        ok: false,
        error: "not_found",
        message: "No answer is available for this question yet.",
      });
      expect(h.store.creditBalances.get("acct-1")).toBe(100);
    });
  });

  describe("language fallback", () => {
    it("falls back to en and queues a translation into the requested language", async () => {
      const h = withActiveMonthly(makeMemoryHarness());
      h.store.library.push(
        buildLibraryRow({ canonicalKey: "vat|any|kano|any", answer: "English VAT answer" })
      );

      const result = await askQuestion(
        h.ask,
        textAsk("Menene haraji na VAT a Kano?"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toEqual({
        ok: true,
        answer: "English VAT answer",
        source: "library",
        language: "en",
        fallbackUsed: true,
      });
      expect(h.store.translationJobs).toHaveLength(1);
      expect(h.store.translationJobs[0]).toMatchObject({
        canonicalKey: "vat|any|kano|any",
        sourceLang: "en",
        targetLang: "ha",
        sourceTable: "library",
        status: "pending",
      });
    });

    it("serves the requested language when it exists", async () => {
      const h = withActiveMonthly(makeMemoryHarness());
      h.store.library.push(
        buildLibraryRow({ canonicalKey: VAT_LAGOS, lang: "en", answer: "English" }),
        buildLibraryRow({ canonicalKey: VAT_LAGOS, lang: "yo", answer: "Yoruba" })
      );

      const result = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?", "yoruba"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toMatchObject({ answer: "Yoruba", language: "yo", fallbackUsed: false });
      expect(h.store.translationJobs).toHaveLength(0);
    });
  });

  describe("denials", () => {
    it("requires an active subscription", async () => {
      const h = makeMemoryHarness();
      h.store.library.push(buildLibraryRow({ canonicalKey: VAT_LAGOS }));

      const result = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toEqual({
        ok: false,
        error: "subscription_required",
        message: "Your plan is not active. Please renew your plan to keep asking questions.",
      });
      expect(h.store.qaEvents[0]).toMatchObject({
        outcome: "blocked",
        reason: "subscription_required",
        creditCost: 0,
        canonicalKey: VAT_LAGOS,
      });
    });

    it("reports the quota when today's Cache limit is used up", async () => {
      const h = withActiveMonthly(makeMemoryHarness({ dailyCacheLimitDefault: 1 }));
      h.store.cache.push(buildCacheRow({ canonicalKey: VAT_LAGOS }));
      const ctx = makeTestCtx({ clockTime: NOW });

      await askQuestion(h.ask, textAsk("What is the VAT rate in Lagos?"), ctx);
      const second = await askQuestion(h.ask, textAsk("What is the VAT rate in Lagos?"), ctx);

      expect(second).toEqual({
        ok: false,
        error: "cache_limit_reached",
        message: "You have reached today's answer limit. Your quota resets tomorrow.",
        quota: { used: 1, limit: 1, resetsAt: new Date("2025-01-16T00:00:00.000Z") },
      });
    });

    it("resets the quota on the next UTC day", async () => {
      const h = withActiveMonthly(makeMemoryHarness({ dailyCacheLimitDefault: 1 }));
      h.store.cache.push(buildCacheRow({ canonicalKey: VAT_LAGOS }));
      const clock = new FakeClock(NOW);

      await askQuestion(h.ask, textAsk("What is the VAT rate in Lagos?"), makeTestCtx({ clock }));
      clock.advance(DAY_MS);
      const nextDay = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?"),
        makeTestCtx({ clock })
      );

      expect(nextDay).toMatchObject({ ok: true, source: "cache" });
      expect(h.store.dailyUsage.get(usageKey("acct-1", "2025-01-16"))).toBe(1);
    });

    it("reports the balance when credits run out, without calling the generator", async () => {
      const h = withActiveMonthly(makeMemoryHarness(), 0);

      const result = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toEqual({
        ok: false,
        error: "no_credits",
        message:
          "You have used all your AI credits for this plan period. Please renew or upgrade your plan.",
        credit: { balance: 0, cost: 1 },
      });
      expect(h.generator.calls).toHaveLength(0);
    });

    it("rejects blank and oversized questions", async () => {
      const h = withActiveMonthly(makeMemoryHarness());
      const ctx = makeTestCtx({ clockTime: NOW });

      expect(await askQuestion(h.ask, textAsk("   "), ctx)).toMatchObject({
        ok: false,
        error: "invalid_request",
      });
      expect(await askQuestion(h.ask, textAsk("x".repeat(2001)), ctx)).toMatchObject({
        ok: false,
        error: "invalid_request",
      });
    });
  });

  describe("generation failure", () => {
    it("refunds the credit and records the error kind", async () => {
      const h = withActiveMonthly(makeMemoryHarness());
      h.generator.setFailure("timeout");

      const result = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toEqual({
        ok: false,
        error: "generation_failed",
        message:
          "We could not generate an answer right now and no credit was used. Please try again shortly.",
      });
      expect(h.store.creditBalances.get("acct-1")).toBe(100);
      expect(h.store.cache).toHaveLength(0);
      expect(h.store.qaEvents[0]).toMatchObject({ outcome: "error", reason: "timeout" });
    });

    it("treats an empty generated answer as a failure", async () => {
      const h = withActiveMonthly(makeMemoryHarness());
      h.generator.setAnswer("   ");

      const result = await askQuestion(
        h.ask,
        textAsk("What is the VAT rate in Lagos?"),
        makeTestCtx({ clockTime: NOW })
      );

      expect(result).toMatchObject({ ok: false, error: "generation_failed" });
      expect(h.store.creditBalances.get("acct-1")).toBe(100);
    });
  });

  describe("first question of a new account", () => {
    it("starts the trial, spends a trial credit and caches the answer", async () => {
      const h = makeMemoryHarness({ autoTrialOnFirstAsk: true });
      const ctx = makeTestCtx({ clockTime: NOW });

      const first = await askQuestion(h.ask, textAsk("What is VAT?"), ctx);

      expect(first).toEqual({
        ok: true,
        answer: "[FAKE_ANSWER] What is VAT?",
        source: "ai",
        language: "en",
        fallbackUsed: false,
      });
      expect(h.store.subscriptions).toHaveLength(1);
      expect(h.store.subscriptions[0]).toMatchObject({ planCode: "trial", status: "trial" });
      expect(h.store.creditBalances.get("acct-1")).toBe(4);
      expect(h.store.cache[0]).toMatchObject({ canonicalKey: "vat|any|any|any", lang: "en" });
      expect(h.store.qaEvents[0]).toMatchObject({ outcome: "ok", source: "ai", creditCost: 1 });

      const again = await askQuestion(h.ask, textAsk("What is VAT?"), ctx);

      expect(again).toMatchObject({
        ok: true,
        answer: "[FAKE_ANSWER] What is VAT?",
        source: "cache",
      });
      expect(h.store.dailyUsage.get(usageKey("acct-1", TODAY))).toBe(1);
      expect(h.store.creditBalances.get("acct-1")).toBe(4);
      expect(h.generator.calls).toHaveLength(1);
    });

    it("does not start a trial for an account with history", async () => {
      const h = makeMemoryHarness({ autoTrialOnFirstAsk: true });
      h.store.subscriptions.push(
        buildSubscription({
          accountId: "acct-1",
          status: "past_due",
          periodStart: new Date(Date.parse(NOW) - 70 * DAY_MS),
          periodEnd: new Date(Date.parse(NOW) - 40 * DAY_MS),
        })
      );
      const ctx = makeTestCtx({ clockTime: NOW });

      const status = await getSubscriptionStatus(h.subscription, "acct-1", ctx);
      const result = await askQuestion(h.ask, textAsk("What is VAT?"), ctx);

      expect(status.state).toBe("expired");
      expect(status.reason).toBe("grace_ended");
      expect(result).toMatchObject({ ok: false, error: "subscription_required" });
      expect(h.store.subscriptions).toHaveLength(1);
    });
  });

  describe("concurrency", () => {
    it("never spends more credits than the balance", async () => {
      const h = withActiveMonthly(makeMemoryHarness(), 3);
      const ctx = makeTestCtx({ clockTime: NOW });
      const states = ["Lagos", "Kano", "Oyo", "Abia", "Edo"];

      const results = await Promise.all(
        states.map((state) => askQuestion(h.ask, textAsk(`What is VAT in ${state}?`), ctx))
      );

      expect(results.filter((r) => r.ok)).toHaveLength(3);
      expect(results.filter((r) => !r.ok && r.error === "no_credits")).toHaveLength(2);
      expect(h.store.creditBalances.get("acct-1")).toBe(0);
    });

    it("never admits more Cache answers than the daily limit", async () => {
      const h = withActiveMonthly(makeMemoryHarness({ dailyCacheLimitDefault: 2 }));
      h.store.cache.push(buildCacheRow({ canonicalKey: VAT_LAGOS }));
      const ctx = makeTestCtx({ clockTime: NOW });

      const results = await Promise.all(
        Array.from({ length: 5 }, () =>
          askQuestion(h.ask, textAsk("What is the VAT rate in Lagos?"), ctx)
        )
      );

      expect(results.filter((r) => r.ok)).toHaveLength(2);
      expect(
        results.filter((r) => !r.ok && r.error === "cache_limit_reached")
      ).toHaveLength(3);
      expect(h.store.dailyUsage.get(usageKey("acct-1", TODAY))).toBe(2);
    });
  });
});
