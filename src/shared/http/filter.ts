// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/filter`
 * Purpose: Minimal composable request handler: a lazily run computation producing Result<Reply, Rejection>.
 * Scope: Filter class (handle, with, or) and the any/route builders. Does not do prefix routing, extraction or recovery.
 * Invariants:
 *   - handle() reads the ambient Route; it must run inside runWithRoute
 *   - A handler throwing a Rejection yields err(rejection); any other throw propagates as a fault
 *   - or(): second filter runs only if the first rejected; a 404 yields to the other rejection
 * Side-effects: none (handlers own their side-effects)
 * Links: route.ts, trace/trace.ts
 * @public
 */

import { WRAP, type WrapSealed } from "./internal";
import { methodNotAllowed, notFound, type Rejectable, Rejection } from "./reject";
import type { Reply } from "./reply";
import { err, ok, type Result } from "./result";
import { getRoute } from "./route";
import type { Traced } from "./trace/traced";

export type FilterResult<R extends Reply, E extends Rejectable = Rejection> =
  Result<R, E>;

export type RouteHandler<R extends Reply> = () => R | Promise<R>;

export class Filter<R extends Reply, E extends Rejectable = Rejection> {
  constructor(private readonly run: () => Promise<FilterResult<R, E>>) {}

  handle(): Promise<FilterResult<R, E>> {
    return this.run();
  }

  /**
   * Decorate this filter.
   *
   * @example
   * const hello = route("GET", "/hello", () => text("hi")).with(context("hello"));
   */
  with(wrapper: WrapSealed): Filter<Traced, E> {
    return wrapper[WRAP](this);
  }

  or<O extends Reply, E2 extends Rejectable>(
    other: Filter<O, E2>
  ): Filter<R | O, E | E2> {
    return new Filter<R | O, E | E2>(async () => {
      const first = await this.handle();
      if (first.ok) return first;
      const second = await other.handle();
      if (second.ok) return second;
      return err(first.error.status === 404 ? second.error : first.error);
    });
  }
}

async function invoke<R extends Reply>(
  handler: RouteHandler<R>
): Promise<FilterResult<R>> {
  try {
    return ok(await handler());
  } catch (error) {
    if (error instanceof Rejection) return err(error);
    throw error;
  }
}

/** Matches every request. */
export function any<R extends Reply>(handler: RouteHandler<R>): Filter<R> {
  return new Filter<R>(() => invoke(handler));
}

/** Matches an exact method and full path. */
export function route<R extends Reply>(
  method: string,
  path: string,
  handler: RouteHandler<R>
): Filter<R> {
  const expected = method.toUpperCase();
  return new Filter<R>(async () => {
    const current = getRoute();
    if (current.fullPath !== path) return err(notFound());
    if (current.method !== expected) return err(methodNotAllowed());
    return invoke(handler);
  });
}
