// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/db/schema`
 * Purpose: Drizzle database schema definitions.
 * Scope: Re-exports every table. Does not handle connections or migrations.
 * Side-effects: none (schema definitions only)
 * Links: drizzle.config.ts
 * @public
 */

export * from "./schema.answers";
export * from "./schema.credits";
export * from "./schema.payments";
export * from "./schema.subscriptions";
