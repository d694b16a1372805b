// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/instrumented`
 * Purpose: Bind an asynchronous computation to a span for its whole lifetime.
 * Scope: Start the computation inside the span scope, run the completion step inside it, close the span, and handle abandonment. Does not inspect results.
 * Invariants:
 *   - The computation starts inside span.inScope(); AsyncLocalStorage restores the span on every continuation the computation schedules, on whichever tick it resumes
 *   - complete() runs at most once, inside the span scope, only after the computation settled and only if not abandoned
 *   - The span is closed exactly once on every path (settle, fault, abandonment)
 *   - Abandonment (signal aborted first) closes the span, skips complete(), rejects with signal.reason, discards the late result
 *   - The abandoned computation keeps running; its later events attach to the nearest open ancestor, never the closed span
 * Side-effects: IO (span close via dispatcher)
 * Links: span.ts, shared/http/trace/with-trace.ts
 * @public
 */

import type { Span } from "./span";

export class Instrumented<T> {
  constructor(
    readonly span: Span,
    private readonly start: () => Promise<T>
  ) {}

  run<U>(complete: (value: T) => U, signal?: AbortSignal): Promise<U> {
    const { span } = this;

    if (signal?.aborted) {
      span.close();
      return Promise.reject(signal.reason);
    }

    return new Promise<U>((resolve, reject) => {
      let settled = false;

      const abandon = (): void => {
        if (settled) return;
        settled = true;
        span.close();
        reject(signal?.reason);
      };

      const settle = (): boolean => {
        if (settled) return false;
        settled = true;
        signal?.removeEventListener("abort", abandon);
        return true;
      };

      signal?.addEventListener("abort", abandon, { once: true });

      let pending: Promise<T>;
      try {
        pending = span.inScope(this.start);
      } catch (error) {
        settle();
        span.close();
        reject(error);
        return;
      }

      void pending.then(
        (value) => {
          // Abandoned computations finish unobserved.
          if (!settle()) return;
          try {
            resolve(span.inScope(() => complete(value)));
          } catch (error) {
            reject(error);
          } finally {
            span.close();
          }
        },
        (error: unknown) => {
          if (!settle()) return;
          span.close();
          reject(error);
        }
      );
    });
  }
}
