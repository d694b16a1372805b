// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/span`
 * Purpose: Named, leveled diagnostic scope with fields, parent linkage and an async-aware active scope.
 * Scope: Span lifecycle (create, record, inScope, close) and the active-span store. Does not decide what a span is for.
 * Invariants:
 *   - Parent is the nearest open span in the active chain at creation time
 *   - inScope() makes the span active for fn and every continuation fn schedules (AsyncLocalStorage)
 *   - close() is idempotent; the dispatcher sees onClose exactly once
 *   - Disabled spans (level/target not enabled) never become active and emit nothing
 *   - A closed span stays in the async context of work that outlives it (e.g. abandoned requests); attribution skips it
 * Side-effects: IO (via dispatcher)
 * Links: dispatcher.ts, instrumented.ts
 * @public
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";

import { type Dispatcher, getDispatcher } from "./dispatcher";
import type { FieldValue, Fields } from "./fields";
import type { Level } from "./level";

export interface SpanMetadata {
  readonly name: string;
  readonly target: string;
  readonly level: Level;
}

const activeSpan = new AsyncLocalStorage<Span>();

export class Span {
  readonly id: string = randomUUID();
  private readonly values: Record<string, FieldValue>;
  private closed = false;

  private constructor(
    readonly metadata: SpanMetadata,
    readonly parent: Span | undefined,
    fields: Fields,
    private readonly dispatcher: Dispatcher | undefined
  ) {
    this.values = { ...fields };
  }

  /**
   * Create a span that is not yet active. The current dispatcher decides
   * whether it is enabled.
   */
  static create(metadata: SpanMetadata, fields: Fields = {}): Span {
    const dispatcher = getDispatcher();
    const parent = currentOpenSpan();
    if (!dispatcher.enabled({ kind: "span", ...metadata })) {
      return new Span(metadata, parent, fields, undefined);
    }
    const span = new Span(metadata, parent, fields, dispatcher);
    dispatcher.onNewSpan(span);
    return span;
  }

  get name(): string {
    return this.metadata.name;
  }

  get target(): string {
    return this.metadata.target;
  }

  get level(): Level {
    return this.metadata.level;
  }

  get isDisabled(): boolean {
    return this.dispatcher === undefined;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  fields(): Fields {
    return { ...this.values };
  }

  /** Attach fields. Ignored once the span is closed. */
  record(fields: Fields): void {
    if (this.closed) return;
    Object.assign(this.values, fields);
    this.dispatcher?.onRecord(this, fields);
  }

  inScope<T>(fn: () => T): T {
    if (this.dispatcher === undefined) return fn();
    return activeSpan.run(this, fn);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.dispatcher?.onClose(this);
  }

  /** Ancestors from the root down to this span. */
  path(): Span[] {
    const chain: Span[] = [];
    for (let span: Span | undefined = this; span; span = span.parent) {
      chain.unshift(span);
    }
    return chain;
  }
}

export function currentSpan(): Span | undefined {
  return activeSpan.getStore();
}

/** Active span, or its nearest ancestor that is still open. */
export function currentOpenSpan(): Span | undefined {
  let span = currentSpan();
  while (span?.isClosed) span = span.parent;
  return span;
}

interface SpanOptions {
  target: string;
  fields?: Fields;
}

export function infoSpan(name: string, options: SpanOptions): Span {
  return Span.create(
    { name, target: options.target, level: "info" },
    options.fields
  );
}

export function debugSpan(name: string, options: SpanOptions): Span {
  return Span.create(
    { name, target: options.target, level: "debug" },
    options.fields
  );
}
