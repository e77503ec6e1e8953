// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/answers/drizzle-qa-event`
 * Purpose: Append-only ask telemetry writer.
 * Scope: Inserts qa_events rows. Does not aggregate.
 * Side-effects: IO (database operations)
 * Links: Implements QaEventLog port
 * @public
 */

import type { Database } from "@/adapters/server/db/client";
import type { QaEvent, QaEventLog } from "@/ports";
import { qaEvents } from "@/shared/db";

export class DrizzleQaEventLog implements QaEventLog {
  constructor(private readonly db: Database) {}

  async record(event: QaEvent): Promise<void> {
    await this.db.insert(qaEvents).values({
      accountId: event.accountId,
      channel: event.channel,
      mode: event.mode,
      lang: event.lang,
      question: event.question,
      normalizedQuestion: event.normalizedQuestion,
      canonicalKey: event.canonicalKey,
      outcome: event.outcome,
      reason: event.reason,
      source: event.source,
      fallbackUsed: event.fallbackUsed,
      creditCost: event.creditCost,
      latencyMs: Math.round(event.latencyMs),
      createdAt: event.createdAt,
    });
  }
}
