// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/otel-dispatcher`
 * Purpose: Dispatcher that mirrors diagnostic spans onto OpenTelemetry spans.
 * Scope: Span start/attributes/events/end through an injected Tracer. Does NOT initialize the SDK (bootstrap/otel.ts does).
 * Invariants:
 *   - Parent linkage follows Span.parent via explicit parent context (no reliance on an OTel context manager)
 *   - Fields become attributes; target/level are recorded as diag.target/diag.level
 *   - Events attach to the OTel span of their active span; events outside any span are dropped
 *   - end() is called exactly once per span (on close)
 * Side-effects: IO (OTel span recording)
 * Links: bootstrap/otel.ts, dispatcher.ts
 * @public
 */

import { context, type Span as OtelSpan, type Tracer, trace } from "@opentelemetry/api";

import type { DiagnosticEvent, Dispatcher, Metadata } from "./dispatcher";
import type { Fields } from "./fields";
import type { Span } from "./span";
import type { TargetFilter } from "./target-filter";

export class OtelDispatcher implements Dispatcher {
  private readonly spans = new Map<string, OtelSpan>();

  constructor(
    private readonly tracer: Tracer,
    private readonly filter: TargetFilter
  ) {}

  enabled(metadata: Metadata): boolean {
    return this.filter.enabled(metadata.target, metadata.level);
  }

  onNewSpan(span: Span): void {
    const parent = span.parent ? this.spans.get(span.parent.id) : undefined;
    const parentContext = parent
      ? trace.setSpan(context.active(), parent)
      : context.active();

    const otelSpan = this.tracer.startSpan(
      span.name,
      {
        attributes: {
          "diag.target": span.target,
          "diag.level": span.level,
          ...span.fields(),
        },
      },
      parentContext
    );
    this.spans.set(span.id, otelSpan);
  }

  onRecord(span: Span, fields: Fields): void {
    this.spans.get(span.id)?.setAttributes(fields);
  }

  onEvent(event: DiagnosticEvent): void {
    if (!event.span) return;
    this.spans.get(event.span.id)?.addEvent(
      event.message ?? "event",
      { "diag.target": event.target, "diag.level": event.level, ...event.fields },
      event.timestamp
    );
  }

  onClose(span: Span): void {
    const otelSpan = this.spans.get(span.id);
    if (!otelSpan) return;
    this.spans.delete(span.id);
    otelSpan.end();
  }

  async flush(): Promise<void> {}
}
