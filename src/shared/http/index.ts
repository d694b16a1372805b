// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http`
 * Purpose: Public API for the request-handling pipeline and its instrumentation.
 * Scope: Re-exports only. The sealed wrapping contract (internal.ts) is intentionally not exported.
 * Side-effects: none
 * @public
 */

export {
  any,
  Filter,
  type FilterResult,
  type RouteHandler,
  route,
} from "./filter";
export {
  isRejection,
  methodNotAllowed,
  notFound,
  type Rejectable,
  Rejection,
  reject,
} from "./reject";
export { json, type Reply, text, withHeader, withStatus } from "./reply";
export { err, ok, type Result } from "./result";
export {
  getRoute,
  type HttpVersion,
  hasRoute,
  type ReadonlyHeaders,
  type RemoteAddr,
  type Route,
  RouteContextError,
  runWithRoute,
} from "./route";
export {
  createRequestListener,
  RequestAbandonedError,
  type RequestListenerDeps,
  pathFromTarget,
  routeFromIncomingMessage,
} from "./server";
export {
  context,
  RequestInfo,
  request,
  type SpanFactory,
  Trace,
  TRACE_TARGET,
  Traced,
  trace,
} from "./trace";
