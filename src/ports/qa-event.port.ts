// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/qa-event.port`
 * Purpose: Append-only telemetry of ask outcomes.
 * Scope: Interface only. Writes are best-effort and never affect the ask response.
 * Side-effects: none (interface definition only)
 * Links: Implemented by DrizzleQaEventLog and InMemoryQaEventLog
 * @public
 */

import type { AnswerSource } from "@/core/answers/public";
import type { Language } from "@/core/canonical/public";
import type { InteractionMode } from "@/core/entitlements/public";

export type QaOutcome = "ok" | "blocked" | "error";

export interface QaEvent {
  accountId: string;
  /** Delivery channel the question came through (web, whatsapp, telegram, ...); null when the caller gave none */
  channel: string | null;
  mode: InteractionMode;
  lang: Language;
  question: string;
  normalizedQuestion: string;
  canonicalKey: string;
  outcome: QaOutcome;
  reason: string | null;
  source: AnswerSource | null;
  fallbackUsed: boolean;
  creditCost: number;
  latencyMs: number;
  createdAt: Date;
}

export interface QaEventLog {
  record(event: QaEvent): Promise<void>;
}
