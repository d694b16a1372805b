// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the server runtime; provides lazy, cached access. Does not configure logging or tracing itself.
 * Invariants: All env vars validated on first access; LOG_FILTER must parse as a TargetFilter; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: Lazy init keeps module import free of validation; resetServerEnv() exists for tests.
 * Links: bootstrap/tracing.ts, main.ts
 * @public
 */

import { ZodError, z } from "zod";

import { TargetFilter } from "@/shared/observability/tracing";

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

const booleanString = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  HOST: z.string().min(1).default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65535).default(3030),

  // Service identity for observability
  SERVICE_NAME: z.string().default("app"),

  // Diagnostic filter directives, e.g. "example=info,routetrace=debug"
  LOG_FILTER: z
    .string()
    .default("example=info,routetrace=debug")
    .refine(
      (value) => {
        try {
          TargetFilter.parse(value);
          return true;
        } catch {
          return false;
        }
      },
      { message: "Invalid LOG_FILTER directive" }
    ),

  OTEL_ENABLED: booleanString.default("false"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
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
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

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

/** Drop the cached env so the next serverEnv() re-reads process.env. */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
