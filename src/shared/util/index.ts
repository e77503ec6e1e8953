// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/util`
 * Purpose: Public surface for shared utilities via re-exports.
 * Scope: Re-exports public utility functions. Does not export internal helpers.
 * Side-effects: none
 * @public
 */

export { type FireAndForgetOptions, fireAndForget } from "./fireAndForget";
export {
  extractBearerToken,
  hmacSha512Hex,
  safeCompare,
  verifyHmacSha512,
} from "./signatures";
