// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/trace`
 * Purpose: Filter decorators that instrument every request with a diagnostic span.
 * Scope: trace(factory) plus the request() and context(name) presets. Does not configure the dispatcher.
 * Invariants:
 *   - trace() is the only way to build a decorator; request()/context() go through it
 *   - request(): info span "request" { method, path (quoted), version }
 *   - context(name): debug span "context" { message: name }; ignores the request
 * Side-effects: none until a wrapped filter runs
 * Links: with-trace.ts, info.ts
 * @public
 */

import {
  debugSpan,
  debugValue,
  infoSpan,
  type Span,
} from "@/shared/observability/tracing";

import type { Filter } from "../filter";
import { WRAP, type WrapSealed } from "../internal";
import type { Rejectable } from "../reject";
import type { Reply } from "../reply";
import type { RequestInfo } from "./info";
import { TRACE_TARGET } from "./target";
import type { Traced } from "./traced";
import { withTrace } from "./with-trace";

/** Builds a fresh, not-yet-active span for one request. Must not keep `info`. */
export type SpanFactory = (info: RequestInfo) => Span;

/**
 * Decorates a filter to create a span for requests and responses.
 */
export class Trace implements WrapSealed {
  constructor(private readonly factory: SpanFactory) {}

  wrap<R extends Reply, E extends Rejectable>(
    filter: Filter<R, E>
  ): Filter<Traced, E> {
    return withTrace(this.factory, filter);
  }

  [WRAP]<R extends Reply, E extends Rejectable>(
    filter: Filter<R, E>
  ): Filter<Traced, E> {
    return this.wrap(filter);
  }
}

/**
 * Instrument every request with a span provided by `factory`.
 *
 * @example
 * const routes = any(() => text("ok")).with(
 *   trace((info) => infoSpan("request", { target: "example", fields: { path: info.path() } }))
 * );
 */
export function trace(factory: SpanFactory): Trace {
  return new Trace(factory);
}

/** Info-level span summarizing the request. */
export function request(): Trace {
  return trace((info) =>
    infoSpan("request", {
      target: TRACE_TARGET,
      fields: {
        method: info.method(),
        path: debugValue(info.path()),
        version: info.version(),
      },
    })
  );
}

/**
 * Debug-level span representing a named context, for per-route sub-spans.
 *
 * @example
 * const hello = route("GET", "/hello", () => text("hi")).with(context("hello"));
 * const goodbye = route("GET", "/goodbye", () => text("bye")).with(context("goodbye"));
 * const routes = hello.or(goodbye).with(request());
 */
export function context(name: string): Trace {
  return trace(() =>
    debugSpan("context", { target: TRACE_TARGET, fields: { message: name } })
  );
}
