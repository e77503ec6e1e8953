// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the server runtime and batch jobs; provides lazy server environment access.
 * Invariants: All required env vars validated on first access; provides boolean flags for runtime and test modes; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV controls adapter wiring (test = in-process adapters and fakes). Lazy init keeps module import free of env access.
 * Links: Environment configuration, src/bootstrap/container.ts
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

/** "true"/"false"/"1"/"0" strings; z.coerce.boolean treats "false" as true */
const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

// Server schema with all environment variables
const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Application environment (controls adapter wiring)
  APP_ENV: z.enum(["test", "production"]),

  // Service identity for observability
  SERVICE_NAME: z.string().default("taxdesk"),
  DEPLOY_ENVIRONMENT: z.string().optional(),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  DATABASE_URL: z.string().url(),

  // Answer generation / translation gateway (OpenAI-compatible, LiteLLM proxy)
  LITELLM_BASE_URL: z
    .string()
    .url()
    .default(
      process.env.NODE_ENV === "production"
        ? "http://litellm:4000"
        : "http://localhost:4000"
    ),
  LITELLM_MASTER_KEY: z.string().min(1).optional(),
  DEFAULT_MODEL: z.string().default("gpt-4o-mini"),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TRANSLATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Payment provider
  PAYSTACK_SECRET_KEY: z.string().min(1).optional(),
  PAYSTACK_BASE_URL: z.string().url().default("https://api.paystack.co"),
  PAYMENT_VERIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // Admin activation endpoint bearer token
  ADMIN_API_TOKEN: z.string().min(32).optional(),
  // Bearer token for /api/metrics; the route answers 500 when unset
  METRICS_TOKEN: z.string().min(16).optional(),

  // Entitlements
  GRACE_WINDOW_DAYS: z.coerce.number().min(0).default(5),
  DAILY_CACHE_LIMIT_DEFAULT: z.coerce.number().int().default(1000),
  AUTO_TRIAL_ON_FIRST_ASK: booleanFlag.default("true"),

  // Best-effort writes (use-count touch, QA events)
  TOUCH_TIMEOUT_MS: z.coerce.number().int().positive().default(2_000),

  // Translation backlog drain
  TRANSLATION_BATCH_SIZE: z.coerce.number().int().positive().default(25),
  TRANSLATION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);

      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // Treat all invalid_type as missing (avoids any casting)
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/**
 * Drop the memoized env. For tests that change process.env between cases.
 */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
