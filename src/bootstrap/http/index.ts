// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/http`
 * Purpose: HTTP route utilities for bootstrapping.
 * Scope: Bootstrap-layer exports: route wrapper. Does NOT handle business logic.
 * Side-effects: none (container init deferred to first request)
 * @public
 */

export { wrapRouteHandlerWithLogging } from "./wrapRouteHandlerWithLogging";
