// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema.answers`
 * Purpose: Answer store tables (curated library, generated cache), translation backlog and ask telemetry.
 * Scope: Defines qa_library, qa_cache, translation_backlog, qa_events. Does not include billing tables.
 * Invariants:
 * - qa_cache is unique on (canonical_key, lang) when canonical_key is set, else on (normalized_question, lang).
 * - translation_backlog is unique on (canonical_key, target_lang).
 * - qa_events is append-only.
 * Side-effects: none (schema definitions only)
 * @public
 */

import { sql } from "drizzle-orm";
import {
  boolean,
  index,
  integer,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";

/** Mirrors SUPPORTED_LANGUAGES in core/canonical */
const LANGUAGE_CODES = ["en", "yo", "ig", "ha", "pcm"] as const;

export const qaLibrary = pgTable(
  "qa_library",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    canonicalKey: text("canonical_key"),
    normalizedQuestion: text("normalized_question").notNull(),
    lang: text("lang", { enum: LANGUAGE_CODES })
      .notNull()
      .default("en"),
    answer: text("answer").notNull(),
    enabled: boolean("enabled").notNull().default(true),
    priority: integer("priority").notNull().default(0),
    useCount: integer("use_count").notNull().default(0),
    lastUsedAt: timestamp("last_used_at", { withTimezone: true }),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    keyLangIdx: index("qa_library_key_lang_idx").on(
      table.canonicalKey,
      table.lang
    ),
    questionLangIdx: index("qa_library_question_lang_idx").on(
      table.normalizedQuestion,
      table.lang
    ),
  })
);

export const qaCache = pgTable(
  "qa_cache",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    canonicalKey: text("canonical_key"),
    normalizedQuestion: text("normalized_question").notNull(),
    lang: text("lang", { enum: LANGUAGE_CODES })
      .notNull()
      .default("en"),
    answer: text("answer").notNull(),
    source: text("source", { enum: ["ai", "library"] })
      .notNull()
      .default("ai"),
    enabled: boolean("enabled").notNull().default(true),
    priority: integer("priority").notNull().default(0),
    useCount: integer("use_count").notNull().default(0),
    lastUsedAt: timestamp("last_used_at", { withTimezone: true }),
    enabledAt: timestamp("enabled_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    keyLangUnique: uniqueIndex("qa_cache_key_lang_unique")
      .on(table.canonicalKey, table.lang)
      .where(sql`${table.canonicalKey} is not null`),
    questionLangUnique: uniqueIndex("qa_cache_question_lang_unique")
      .on(table.normalizedQuestion, table.lang)
      .where(sql`${table.canonicalKey} is null`),
  })
);

export const translationBacklog = pgTable(
  "translation_backlog",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    canonicalKey: text("canonical_key").notNull(),
    sourceLang: text("source_lang", { enum: LANGUAGE_CODES }).notNull(),
    targetLang: text("target_lang", { enum: LANGUAGE_CODES }).notNull(),
    sourceTable: text("source_table", { enum: ["cache", "library"] }).notNull(),
    status: text("status", { enum: ["pending", "done", "failed"] })
      .notNull()
      .default("pending"),
    attempts: integer("attempts").notNull().default(0),
    lastError: text("last_error"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    keyTargetUnique: uniqueIndex("translation_backlog_key_target_unique").on(
      table.canonicalKey,
      table.targetLang
    ),
    statusCreatedIdx: index("translation_backlog_status_created_idx").on(
      table.status,
      table.createdAt
    ),
  })
);

export const qaEvents = pgTable(
  "qa_events",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    accountId: text("account_id").notNull(),
    channel: text("channel"),
    mode: text("mode", { enum: ["text", "voice"] }).notNull(),
    lang: text("lang", { enum: LANGUAGE_CODES }).notNull(),
    question: text("question").notNull(),
    normalizedQuestion: text("normalized_question").notNull(),
    canonicalKey: text("canonical_key").notNull(),
    outcome: text("outcome", { enum: ["ok", "blocked", "error"] }).notNull(),
    reason: text("reason"),
    source: text("source", { enum: ["library", "cache", "ai"] }),
    fallbackUsed: boolean("fallback_used").notNull().default(false),
    creditCost: integer("credit_cost").notNull().default(0),
    latencyMs: integer("latency_ms").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    accountCreatedIdx: index("qa_events_account_created_idx").on(
      table.accountId,
      table.createdAt
    ),
  })
);
