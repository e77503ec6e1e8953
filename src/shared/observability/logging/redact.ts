// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url"); raw webhook bodies never logged.
 * Side-effects: none
 * Links: Imported by logger module
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  "LITELLM_MASTER_KEY",
  "PAYSTACK_SECRET_KEY",
  "ADMIN_API_TOKEN",
  // HTTP headers
  "req.headers.authorization",
  "req.headers.cookie",
  "headers.authorization",
  "headers.cookie",
  'headers["x-paystack-signature"]',
  // Payment payloads
  "signature",
  "rawBody",
  "customer.email",
  "metadata.email",
  "metadata.wa_phone",
];
