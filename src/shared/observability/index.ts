// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability - logging, tracing, metrics.
 * Scope: Unified entry point for observability utilities. Does not implement logic.
 * Invariants: No imports from bootstrap.
 * Side-effects: none
 * @public
 */

export {
  type Logger,
  logRequestEnd,
  logRequestError,
  makeLogger,
  makeNoopLogger,
} from "./logging";
export {
  httpRequestDurationMs,
  httpRequestsTotal,
  metricsRegistry,
  statusBucket,
} from "./metrics";
export * from "./tracing";
