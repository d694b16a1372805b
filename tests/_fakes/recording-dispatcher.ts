// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/recording-dispatcher`
 * Purpose: In-memory dispatcher capturing spans and events for assertions.
 * Scope: Records span creation/fields/close and events. Does NOT format or export anything.
 * Invariants: Span records keep creation order; events keep emission order; closeCount counts onClose calls.
 * Side-effects: none
 * Notes: Enables every target at trace by default; pass a TargetFilter to narrow.
 * Links: shared/observability/tracing/dispatcher.ts
 * @public
 */

import {
  type DiagnosticEvent,
  type Dispatcher,
  type FieldValue,
  type Fields,
  type Level,
  type Metadata,
  type Span,
  TargetFilter,
} from "@/shared/observability/tracing";

export interface RecordedSpan {
  id: string;
  name: string;
  target: string;
  level: Level;
  parentId: string | undefined;
  fields: Record<string, FieldValue>;
  closeCount: number;
}

export interface RecordedEvent {
  level: Level;
  target: string;
  message: string | undefined;
  fields: Fields;
  spanId: string | undefined;
}

export class RecordingDispatcher implements Dispatcher {
  readonly spans: RecordedSpan[] = [];
  readonly events: RecordedEvent[] = [];
  flushCount = 0;

  constructor(
    private readonly filter: TargetFilter = TargetFilter.atLevel("trace")
  ) {}

  enabled(metadata: Metadata): boolean {
    return this.filter.enabled(metadata.target, metadata.level);
  }

  onNewSpan(span: Span): void {
    this.spans.push({
      id: span.id,
      name: span.name,
      target: span.target,
      level: span.level,
      parentId: span.parent?.id,
      fields: { ...span.fields() },
      closeCount: 0,
    });
  }

  onRecord(span: Span, fields: Fields): void {
    Object.assign(this.spanById(span.id).fields, fields);
  }

  onEvent(event: DiagnosticEvent): void {
    this.events.push({
      level: event.level,
      target: event.target,
      message: event.message,
      fields: event.fields,
      spanId: event.span?.id,
    });
  }

  onClose(span: Span): void {
    this.spanById(span.id).closeCount += 1;
  }

  async flush(): Promise<void> {
    this.flushCount += 1;
  }

  spanById(id: string): RecordedSpan {
    const span = this.spans.find((s) => s.id === id);
    if (!span) throw new Error(`No recorded span with id ${id}`);
    return span;
  }

  /** Context spans by their `message` field. */
  contextSpan(name: string): RecordedSpan {
    const span = this.spans.find(
      (s) => s.name === "context" && s.fields.message === name
    );
    if (!span) throw new Error(`No recorded context span "${name}"`);
    return span;
  }
}
