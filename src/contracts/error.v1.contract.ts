// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/error.v1.contract`
 * Purpose: Error body shared by non-2xx responses.
 * Scope: Edge IO definition. Does not contain business logic.
 * Side-effects: none
 * @internal
 */

import { z } from "zod";

export const errorResponseSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;
