// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/route`
 * Purpose: Ambient per-request context (method, path, version, peer, headers, abort signal) via AsyncLocalStorage.
 * Scope: Route type and run/get accessors. Does not parse requests (server.ts builds the Route).
 * Invariants:
 *   - One Route per request; never mutated after construction
 *   - getRoute() throws RouteContextError outside runWithRoute
 *   - signal aborts when the client abandons the request
 * Side-effects: none (AsyncLocalStorage is per-request isolation)
 * Links: server.ts, filter.ts, trace/with-trace.ts
 * @public
 */

import { AsyncLocalStorage } from "node:async_hooks";

export type HttpVersion = `HTTP/${string}`;

export interface RemoteAddr {
  readonly address: string;
  readonly port: number;
  readonly family: string;
}

export type ReadonlyHeaders = Omit<Headers, "append" | "delete" | "set">;

export interface Route {
  readonly method: string;
  /** Full request path, without the query string. */
  readonly fullPath: string;
  readonly version: HttpVersion;
  readonly remoteAddr: RemoteAddr | undefined;
  readonly headers: ReadonlyHeaders;
  readonly signal: AbortSignal;
}

export class RouteContextError extends Error {
  constructor() {
    super(
      "getRoute() called outside of runWithRoute. " +
        "Ensure the filter is invoked through the request listener or runWithRoute()."
    );
    this.name = "RouteContextError";
  }
}

const routeALS = new AsyncLocalStorage<Route>();

export function runWithRoute<T>(route: Route, fn: () => T): T {
  return routeALS.run(route, fn);
}

/**
 * @throws RouteContextError if called outside of runWithRoute
 */
export function getRoute(): Route {
  const route = routeALS.getStore();
  if (!route) {
    throw new RouteContextError();
  }
  return route;
}

export function hasRoute(): boolean {
  return routeALS.getStore() !== undefined;
}
