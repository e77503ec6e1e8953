// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util/signatures`
 * Purpose: HMAC signing and constant-time comparison for webhook signatures and bearer tokens.
 * Scope: Pure crypto helpers over node:crypto. Does not read secrets from env.
 * Invariants: Comparisons never short-circuit on content or length.
 * Side-effects: none
 * Links: features/payments, app/api/admin
 * @public
 */

import { createHash, createHmac, timingSafeEqual } from "node:crypto";

/** Max auth header length to prevent DoS */
const MAX_AUTH_HEADER_LENGTH = 512;
/** Max token length after parsing (before comparison) */
const MAX_TOKEN_LENGTH = 256;

/** Strings are signed as UTF-8; byte payloads are signed as given. */
export function hmacSha512Hex(
  secret: string,
  payload: string | Uint8Array
): string {
  return createHmac("sha512", secret).update(payload).digest("hex");
}

/**
 * Constant-time string comparison using SHA-256 digests.
 * Both inputs are hashed to fixed 32-byte digests, so length never leaks.
 */
export function safeCompare(a: string, b: string): boolean {
  const hashA = createHash("sha256").update(a, "utf8").digest();
  const hashB = createHash("sha256").update(b, "utf8").digest();
  return timingSafeEqual(hashA, hashB);
}

/**
 * Check a hex HMAC-SHA512 signature of `payload`.
 * Header values are compared case-insensitively (hex digits only).
 */
export function verifyHmacSha512(
  secret: string,
  payload: string | Uint8Array,
  signature: string | null
): boolean {
  if (!signature || !secret) return false;
  const expected = hmacSha512Hex(secret, payload);
  return safeCompare(expected, signature.trim().toLowerCase());
}

/**
 * Extract bearer token from Authorization header.
 * Handles case-insensitive "Bearer " prefix, trims whitespace.
 */
export function extractBearerToken(authHeader: string | null): string | null {
  if (!authHeader) return null;
  if (authHeader.length > MAX_AUTH_HEADER_LENGTH) return null;

  const trimmed = authHeader.trim();
  if (!trimmed.toLowerCase().startsWith("bearer ")) return null;

  const token = trimmed.slice(7).trim();
  if (token.length > MAX_TOKEN_LENGTH) return null;

  return token;
}
