// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/trace/with-trace`
 * Purpose: The filter produced by Trace: one span per request, active across the whole inner computation.
 * Scope: Span creation, "received request" event, instrumentation of the inner filter, outcome recording. Does not transform results.
 * Invariants:
 *   - Factory invoked exactly once per request, synchronously, before the inner filter starts
 *   - A missing route context or a throwing factory rejects the wrapped invocation (no span, no events)
 *   - "received request" emitted once at trace level inside the span, before the inner filter starts (also when abandoned)
 *   - Abandonment (route.signal aborts) closes the span without an outcome event
 *   - Once created, the span is closed on every path, including a sink that throws on "received request"
 * Side-effects: IO (spans and events via dispatcher)
 * Links: trace.ts, traced.ts, shared/observability/tracing/instrumented.ts
 * @internal
 */

import { Instrumented } from "@/shared/observability/tracing";

import { Filter } from "../filter";
import type { Rejectable } from "../reject";
import type { Reply } from "../reply";
import { getRoute } from "../route";
import { RequestInfo } from "./info";
import { diag } from "./target";
import type { SpanFactory } from "./trace";
import { Traced } from "./traced";

export function withTrace<R extends Reply, E extends Rejectable>(
  factory: SpanFactory,
  inner: Filter<R, E>
): Filter<Traced, E> {
  return new Filter<Traced, E>(async () => {
    const route = getRoute();
    const span = factory(new RequestInfo(route));

    try {
      span.inScope(() => diag.trace("received request"));
    } catch (error) {
      span.close();
      throw error;
    }

    const instrumented = new Instrumented(span, () => inner.handle());
    return instrumented.run(
      (result) => Traced.mapResult(span, result),
      route.signal
    );
  });
}
