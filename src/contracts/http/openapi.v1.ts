// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/http/openapi.v1`
 * Purpose: OpenAPI specification generation from ts-rest router.
 * Scope: Creates OpenAPI v3 document from HTTP contracts. Does not include implementation details.
 * Invariants: Generated spec matches ts-rest router exactly; operation IDs stable.
 * Side-effects: none
 * Links: ts-rest router, /api/v1/openapi.json route
 * @internal
 */

import { generateOpenApi } from "@ts-rest/open-api";

import { ApiContractV1 } from "./router.v1";

export const OpenAPIV1 = generateOpenApi(
  ApiContractV1,
  {
    info: {
      title: "TaxDesk API",
      version: "1.0.0",
      description:
        "Tax-assistance question answering with subscription entitlements.",
    },
    servers: [{ url: "/", description: "Service root" }],
  },
  {
    setOperationId: true,
  }
);
