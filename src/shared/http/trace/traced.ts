// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/trace/traced`
 * Purpose: Marker reply for responses that passed through instrumentation, plus the outcome recorder.
 * Scope: Traced reply and mapResult(). Does not open or close spans.
 * Invariants:
 *   - ok: reply materialized once; response.status recorded on the span and emitted at debug; the same Response is exposed by Traced
 *   - err: response.status + response.error recorded and emitted at trace; the identical result object is returned
 *   - Never remaps statuses
 * Side-effects: IO (span record + event via dispatcher)
 * Links: with-trace.ts
 * @public
 */

import type { Span } from "@/shared/observability/tracing";

import type { Rejectable } from "../reject";
import type { Reply } from "../reply";
import { ok, type Result } from "../result";
import { diag } from "./target";

export class Traced implements Reply {
  constructor(private readonly response: Response) {}

  intoResponse(): Response {
    return this.response;
  }

  /** Call inside the span's scope so the outcome event is attributed to it. */
  static mapResult<R extends Reply, E extends Rejectable>(
    span: Span,
    result: Result<R, E>
  ): Result<Traced, E> {
    if (result.ok) {
      const response = result.value.intoResponse();
      const fields = { "response.status": response.status };
      span.record(fields);
      diag.event("debug", fields);
      return ok(new Traced(response));
    }

    const fields = {
      "response.status": result.error.status,
      "response.error": result.error.toDebugString(),
    };
    span.record(fields);
    diag.event("trace", fields);
    return result;
  }
}
