// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/dispatcher`
 * Purpose: Dispatcher contract plus the process-wide and scoped dispatcher registry.
 * Scope: Holds the single global dispatcher and an AsyncLocalStorage override. Does not format or export diagnostics itself.
 * Invariants:
 *   - Global dispatcher is set at most once per process (DispatcherAlreadySetError otherwise)
 *   - Scoped dispatcher (withDispatcher) wins over the global one inside its async scope
 *   - With nothing configured, the noop dispatcher enables nothing
 * Side-effects: global (module-scoped dispatcher slot)
 * Notes: Library code only emits through getDispatcher(); wiring happens in bootstrap/tracing.
 * Links: bootstrap/tracing.ts, PinoDispatcher, OtelDispatcher
 * @public
 */

import { AsyncLocalStorage } from "node:async_hooks";

import type { Fields } from "./fields";
import type { Level } from "./level";
import type { Span } from "./span";

export interface Metadata {
  readonly kind: "span" | "event";
  readonly name: string;
  readonly target: string;
  readonly level: Level;
}

export interface DiagnosticEvent {
  readonly level: Level;
  readonly target: string;
  readonly message: string | undefined;
  readonly fields: Fields;
  /** Nearest open span in the active chain at emission time. */
  readonly span: Span | undefined;
  readonly timestamp: number;
}

/**
 * Sink for spans and events. Implementations must tolerate concurrent
 * emission from many in-flight requests.
 */
export interface Dispatcher {
  enabled(metadata: Metadata): boolean;
  onNewSpan(span: Span): void;
  onRecord(span: Span, fields: Fields): void;
  onEvent(event: DiagnosticEvent): void;
  onClose(span: Span): void;
  flush(): Promise<void>;
}

export class DispatcherAlreadySetError extends Error {
  constructor() {
    super("A global dispatcher has already been set for this process");
    this.name = "DispatcherAlreadySetError";
  }
}

const NOOP_DISPATCHER: Dispatcher = {
  enabled: () => false,
  onNewSpan: () => undefined,
  onRecord: () => undefined,
  onEvent: () => undefined,
  onClose: () => undefined,
  flush: async () => undefined,
};

let globalDispatcher: Dispatcher | undefined;

const scopedDispatcher = new AsyncLocalStorage<Dispatcher>();

/**
 * Install the process-wide dispatcher. Call once at startup, before any
 * instrumented handler runs.
 */
export function setGlobalDispatcher(dispatcher: Dispatcher): void {
  if (globalDispatcher !== undefined) {
    throw new DispatcherAlreadySetError();
  }
  globalDispatcher = dispatcher;
}

export function getDispatcher(): Dispatcher {
  return scopedDispatcher.getStore() ?? globalDispatcher ?? NOOP_DISPATCHER;
}

/**
 * Run `fn` with `dispatcher` overriding the global one for everything in its
 * async scope, including continuations that resume later.
 */
export function withDispatcher<T>(dispatcher: Dispatcher, fn: () => T): T {
  return scopedDispatcher.run(dispatcher, fn);
}

/**
 * Flush and release the global dispatcher. Afterwards emission falls back to
 * the noop dispatcher and a new global may be installed.
 */
export async function shutdownDispatcher(): Promise<void> {
  const dispatcher = globalDispatcher;
  if (dispatcher === undefined) return;
  globalDispatcher = undefined;
  await dispatcher.flush();
}
