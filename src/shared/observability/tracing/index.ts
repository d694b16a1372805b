// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing`
 * Purpose: Public API for spans, events and dispatchers.
 * Scope: Re-exports only.
 * Invariants: none
 * Side-effects: none
 * Notes: Import from this module, not from submodules.
 * @public
 */

export {
  type DiagnosticEvent,
  type Dispatcher,
  DispatcherAlreadySetError,
  getDispatcher,
  type Metadata,
  setGlobalDispatcher,
  shutdownDispatcher,
  withDispatcher,
} from "./dispatcher";
export { createDiag, type Diag, emit } from "./events";
export { FanoutDispatcher } from "./fanout-dispatcher";
export { debugValue, displayValue, type FieldValue, type Fields } from "./fields";
export { Instrumented } from "./instrumented";
export { atLeast, isLevel, type Level, LEVEL_PRIORITY, LEVELS } from "./level";
export { OtelDispatcher } from "./otel-dispatcher";
export { PinoDispatcher } from "./pino-dispatcher";
export {
  currentOpenSpan,
  currentSpan,
  debugSpan,
  infoSpan,
  Span,
  type SpanMetadata,
} from "./span";
export { InvalidFilterError, TargetFilter } from "./target-filter";
