// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/trace`
 * Purpose: Public API for request instrumentation.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export { RequestInfo } from "./info";
export { TRACE_TARGET } from "./target";
export { context, request, type SpanFactory, Trace, trace } from "./trace";
export { Traced } from "./traced";
