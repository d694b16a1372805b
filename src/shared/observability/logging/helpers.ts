// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/helpers`
 * Purpose: Standardized logging helpers for the HTTP envelope.
 * Scope: Request end and unhandled-fault logging. Does not emit diagnostic span events (tracing does).
 * Invariants: Same keys everywhere (method, path, status, durationMs, err, errorCode).
 * Side-effects: IO (emits structured log entries via provided logger)
 * Links: shared/http/server.ts
 * @public
 */

import type { Logger } from "pino";

/**
 * Log request end with consistent fields.
 *
 * @param log - Request-scoped child logger (method, path already bound)
 */
export function logRequestEnd(
  log: Logger,
  meta: {
    status: number;
    durationMs: number;
  }
): void {
  const level =
    meta.status >= 500 ? "error" : meta.status >= 400 ? "warn" : "info";
  log[level](
    { status: meta.status, durationMs: meta.durationMs },
    "request complete"
  );
}

/**
 * Log error with consistent fields: err, errorCode.
 *
 * @param errorCode - Stable app error code for classification
 */
export function logRequestError(
  log: Logger,
  error: unknown,
  errorCode: string
): void {
  log.error({ err: error, errorCode }, "request failed");
}
