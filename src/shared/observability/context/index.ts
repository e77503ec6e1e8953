// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/context`
 * Purpose: Public API for request-scoped context.
 * Scope: Re-export RequestContext type and factories. Does not define context lifecycle.
 * Side-effects: none
 * @public
 */

export {
  createJobContext,
  createRequestContext,
  sanitizeReqId,
} from "./factory";
export type { Clock, RequestContext } from "./types";
