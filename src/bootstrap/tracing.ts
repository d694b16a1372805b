// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/tracing`
 * Purpose: Build and install the process-wide diagnostic dispatcher.
 * Scope: Composition root for dispatchers (pino, optionally OTel). Does not start the OTel SDK (bootstrap/otel.ts does).
 * Invariants: Called once at startup, before any request is served; the same LOG_FILTER governs every sink.
 * Side-effects: global (installs the global dispatcher)
 * Links: shared/observability/tracing/dispatcher.ts, main.ts
 * @public
 */

import { trace } from "@opentelemetry/api";

import type { ServerEnv } from "@/shared/env";
import {
  type Dispatcher,
  FanoutDispatcher,
  type Logger,
  makeLogger,
  OtelDispatcher,
  PinoDispatcher,
  setGlobalDispatcher,
  TargetFilter,
} from "@/shared/observability";

const TRACER_NAME = "routetrace";

export function makeDispatcher(
  env: Pick<ServerEnv, "LOG_FILTER" | "OTEL_ENABLED">,
  log: Logger = makeLogger(undefined, "trace")
): Dispatcher {
  const filter = TargetFilter.parse(env.LOG_FILTER);
  const pino = new PinoDispatcher(log, filter);
  if (!env.OTEL_ENABLED) {
    return pino;
  }
  return new FanoutDispatcher([
    pino,
    new OtelDispatcher(trace.getTracer(TRACER_NAME), filter),
  ]);
}

export function initTracing(
  env: Pick<ServerEnv, "LOG_FILTER" | "OTEL_ENABLED">,
  log?: Logger
): Dispatcher {
  const dispatcher = makeDispatcher(env, log);
  setGlobalDispatcher(dispatcher);
  return dispatcher;
}
