// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/fanout-dispatcher`
 * Purpose: Forward spans and events to several dispatchers, each applying its own filter.
 * Scope: Composition only.
 * Invariants: A child only sees spans/events it enabled; onRecord/onClose reach a child only for spans it saw created.
 * Side-effects: IO (via children)
 * @public
 */

import type { DiagnosticEvent, Dispatcher, Metadata } from "./dispatcher";
import type { Fields } from "./fields";
import type { Span } from "./span";

export class FanoutDispatcher implements Dispatcher {
  private readonly owners = new Map<string, Dispatcher[]>();

  constructor(private readonly children: readonly Dispatcher[]) {}

  enabled(metadata: Metadata): boolean {
    return this.children.some((child) => child.enabled(metadata));
  }

  onNewSpan(span: Span): void {
    const owners = this.children.filter((child) =>
      child.enabled({ kind: "span", ...span.metadata })
    );
    this.owners.set(span.id, owners);
    for (const child of owners) child.onNewSpan(span);
  }

  onRecord(span: Span, fields: Fields): void {
    for (const child of this.owners.get(span.id) ?? []) {
      child.onRecord(span, fields);
    }
  }

  onEvent(event: DiagnosticEvent): void {
    const metadata: Metadata = {
      kind: "event",
      name: "event",
      target: event.target,
      level: event.level,
    };
    for (const child of this.children) {
      if (child.enabled(metadata)) child.onEvent(event);
    }
  }

  onClose(span: Span): void {
    const owners = this.owners.get(span.id) ?? [];
    this.owners.delete(span.id);
    for (const child of owners) child.onClose(span);
  }

  async flush(): Promise<void> {
    await Promise.all(this.children.map((child) => child.flush()));
  }
}
