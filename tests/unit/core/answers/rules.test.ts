// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/answers/rules`
 * Purpose: Unit tests for lookup keys, language fallback order, candidate ranking and translation job fan-out.
 * Scope: Pure business logic. Does NOT test repositories.
 * Invariants: Wildcard keys are never stored or translated; ranking is priority, then enabledAt, then lastUsedAt (nulls last).
 * Side-effects: none
 * Links: core/answers/rules
 * @public
 */

import { buildStoredAnswer } from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import {
  compareCandidates,
  lookupFor,
  lookupLanguages,
  matchesLookup,
  pickBestCandidate,
  storableCanonicalKey,
  translationJobsFor,
} from "@/core/answers/public";
import { canonicalize } from "@/core/canonical/public";

describe("core/answers/rules", () => {
  describe("lookupFor", () => {
    it("looks up by canonical key when one is resolved", () => {
      const canonical = canonicalize("What is the VAT rate in Lagos?");
      expect(storableCanonicalKey(canonical)).toBe("vat|any|lagos|any");
      expect(lookupFor(canonical)).toEqual({
        kind: "canonical",
        canonicalKey: "vat|any|lagos|any",
      });
    });

    it("falls back to the normalized text for wildcard keys", () => {
      const canonical = canonicalize("Hello there!");
      expect(storableCanonicalKey(canonical)).toBeNull();
      expect(lookupFor(canonical)).toEqual({
        kind: "normalized",
        normalized: "hello there",
      });
    });
  });

  describe("lookupLanguages", () => {
    it("tries only en for en", () => {
      expect(lookupLanguages("en")).toEqual(["en"]);
    });

    it("tries the requested language, then en", () => {
      expect(lookupLanguages("ha")).toEqual(["ha", "en"]);
    });
  });

  describe("matchesLookup", () => {
    it("matches normalized lookups only against keyless rows", () => {
      const keyed = buildStoredAnswer({
        canonicalKey: "vat|any|any|any",
        normalizedQuestion: "hello there",
      });
      const keyless = buildStoredAnswer({
        canonicalKey: null,
        normalizedQuestion: "hello there",
      });
      const lookup = { kind: "normalized", normalized: "hello there" } as const;

      expect(matchesLookup(keyed, lookup)).toBe(false);
      expect(matchesLookup(keyless, lookup)).toBe(true);
    });
  });

  describe("candidate ranking", () => {
    const older = new Date("2025-01-01T00:00:00.000Z");
    const newer = new Date("2025-01-10T00:00:00.000Z");

    it("prefers higher priority over newer enablement", () => {
      const high = buildStoredAnswer({ id: "high", priority: 5, enabledAt: older });
      const recent = buildStoredAnswer({ id: "recent", priority: 0, enabledAt: newer });
      expect(pickBestCandidate([recent, high])?.id).toBe("high");
    });

    it("prefers the most recently enabled at equal priority", () => {
      const a = buildStoredAnswer({ id: "a", enabledAt: older });
      const b = buildStoredAnswer({ id: "b", enabledAt: newer });
      expect(pickBestCandidate([a, b])?.id).toBe("b");
    });

    it("orders never-used rows after used ones", () => {
      const unused = buildStoredAnswer({ id: "unused", enabledAt: older });
      const used = buildStoredAnswer({
        id: "used",
        enabledAt: older,
        lastUsedAt: older,
      });
      expect(pickBestCandidate([unused, used])?.id).toBe("used");
      expect(compareCandidates(unused, unused)).toBe(0);
    });

    it("returns null for no candidates", () => {
      expect(pickBestCandidate([])).toBeNull();
    });
  });

  describe("translationJobsFor", () => {
    it("fans out to every other language by default", () => {
      expect(translationJobsFor("vat|any|any|any", "en", "cache")).toEqual([
        { canonicalKey: "vat|any|any|any", sourceLang: "en", targetLang: "yo", sourceTable: "cache" },
        { canonicalKey: "vat|any|any|any", sourceLang: "en", targetLang: "ig", sourceTable: "cache" },
        { canonicalKey: "vat|any|any|any", sourceLang: "en", targetLang: "ha", sourceTable: "cache" },
        { canonicalKey: "vat|any|any|any", sourceLang: "en", targetLang: "pcm", sourceTable: "cache" },
      ]);
    });

    it("limits to the given targets and skips the source language", () => {
      expect(
        translationJobsFor("vat|any|any|any", "en", "library", ["en", "yo"])
      ).toEqual([
        { canonicalKey: "vat|any|any|any", sourceLang: "en", targetLang: "yo", sourceTable: "library" },
      ]);
    });

    it("creates nothing for missing or wildcard keys", () => {
      expect(translationJobsFor(null, "en", "cache")).toEqual([]);
      expect(translationJobsFor("any|any|any|any", "en", "cache")).toEqual([]);
    });
  });
});
