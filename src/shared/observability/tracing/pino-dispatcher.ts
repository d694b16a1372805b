// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/pino-dispatcher`
 * Purpose: Dispatcher that writes diagnostic events as structured pino log lines.
 * Scope: Event → log line with target, event fields, active span and span chain. Does not log span open/close.
 * Invariants:
 *   - Pino level equals event level (trace..error map 1:1)
 *   - Line shape: { target, ...fields, span: { name, ...fields }, spans: [{ name, ...fields }, …] }, msg when present
 *   - Filtering happens here (TargetFilter); the pino logger itself should run at level "trace"
 * Side-effects: IO (writes through pino destination)
 * Links: logging/logger.ts (makeLogger), target-filter.ts
 * @public
 */

import type { Logger } from "pino";

import type { DiagnosticEvent, Dispatcher, Metadata } from "./dispatcher";
import type { Span } from "./span";
import type { TargetFilter } from "./target-filter";

function describeSpan(span: Span): Record<string, unknown> {
  return { name: span.name, ...span.fields() };
}

export class PinoDispatcher implements Dispatcher {
  constructor(
    private readonly log: Logger,
    private readonly filter: TargetFilter
  ) {}

  enabled(metadata: Metadata): boolean {
    return this.filter.enabled(metadata.target, metadata.level);
  }

  onNewSpan(): void {}

  onRecord(): void {}

  onClose(): void {}

  onEvent(event: DiagnosticEvent): void {
    const entry: Record<string, unknown> = {
      target: event.target,
      ...event.fields,
    };
    if (event.span) {
      entry.span = describeSpan(event.span);
      entry.spans = event.span.path().map(describeSpan);
    }

    if (event.message === undefined) {
      this.log[event.level](entry);
    } else {
      this.log[event.level](entry, event.message);
    }
  }

  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.log.flush((err) => (err ? reject(err) : resolve()));
    });
  }
}
