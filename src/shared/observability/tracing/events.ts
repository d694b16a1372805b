// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/events`
 * Purpose: Emit leveled diagnostic events attributed to the active span.
 * Scope: Event construction and level/target filtering. Does not format output.
 * Invariants: An event carries the nearest open span in the active chain; disabled events never reach the dispatcher.
 * Side-effects: IO (via dispatcher)
 * Links: span.ts, dispatcher.ts
 * @public
 */

import { getDispatcher } from "./dispatcher";
import type { Fields } from "./fields";
import type { Level } from "./level";
import { currentOpenSpan } from "./span";

export interface Diag {
  event(level: Level, fields: Fields, message?: string): void;
  trace(message: string, fields?: Fields): void;
  debug(message: string, fields?: Fields): void;
  info(message: string, fields?: Fields): void;
  warn(message: string, fields?: Fields): void;
  error(message: string, fields?: Fields): void;
}

export function emit(
  target: string,
  level: Level,
  fields: Fields,
  message?: string
): void {
  const dispatcher = getDispatcher();
  if (!dispatcher.enabled({ kind: "event", name: "event", target, level })) {
    return;
  }
  dispatcher.onEvent({
    level,
    target,
    message,
    fields,
    span: currentOpenSpan(),
    timestamp: Date.now(),
  });
}

/**
 * Event emitter bound to a target.
 *
 * @example
 * const diag = createDiag("example");
 * diag.info("saying hello...");
 */
export function createDiag(target: string): Diag {
  return {
    event: (level, fields, message) => emit(target, level, fields, message),
    trace: (message, fields = {}) => emit(target, "trace", fields, message),
    debug: (message, fields = {}) => emit(target, "debug", fields, message),
    info: (message, fields = {}) => emit(target, "info", fields, message),
    warn: (message, fields = {}) => emit(target, "warn", fields, message),
    error: (message, fields = {}) => emit(target, "error", fields, message),
  };
}
