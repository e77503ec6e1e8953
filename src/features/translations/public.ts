// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/translations/public`
 * Purpose: Single entrypoint for the translation backlog drain.
 * Side-effects: none
 * @public
 */

export {
  type DrainSummary,
  drainTranslationBacklog,
  type TranslationDrainDeps,
} from "./services/drainTranslationBacklog";
