// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Does not filter diagnostic targets (TargetFilter does).
 * Invariants: Always emits JSON to stdout; no worker transports. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Reads logging-specific env vars directly (NODE_ENV, PINO_LOG_LEVEL, SERVICE_NAME) without serverEnv() to avoid triggering full env validation at module load time.
 *        Formatting via external pipe (pino-pretty).
 * Links: Initializes redaction paths via REDACT_PATHS; used by bootstrap/tracing and the http server adapter.
 * @public
 */

import type { Level, Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export function makeLogger(
  bindings?: Record<string, unknown>,
  level?: Level
): Logger {
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const isVitest = process.env.VITEST === "true";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const nodeEnv = process.env.NODE_ENV ?? "development";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const pinoLogLevel = process.env.PINO_LOG_LEVEL ?? "info";
  // biome-ignore lint/style/noProcessEnv: Logging config only - safe direct access, no validation required
  const serviceName = process.env.SERVICE_NAME ?? "app";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  const config = {
    level: level ?? pinoLogLevel,
    enabled: !isTestTooling,
    // Stable base: bindings first, then reserved keys (prevents overwrite)
    base: { ...bindings, app: "routetrace", service: serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  // Sync in dev for immediate crash visibility, async in prod for performance
  return pino(
    config,
    pino.destination({
      dest: 1,
      sync: nodeEnv !== "production",
      minLength: 4096,
    })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
