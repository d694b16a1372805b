// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/server`
 * Purpose: node:http request listener that runs a Filter per request inside its Route scope.
 * Scope: Route construction from IncomingMessage, response writing, client-disconnect abort, envelope logging, HTTP metrics. Does not listen on sockets (bootstrap does).
 * Invariants:
 *   - Every request runs inside runWithRoute with its own AbortController
 *   - Client disconnect before the response finished aborts route.signal
 *   - Rejections are answered with their own response; unhandled faults are logged and answered 500
 *   - logRequestEnd and metrics recorded exactly once per request (finally)
 * Side-effects: IO (socket writes, structured logs, Prometheus metrics)
 * Links: route.ts, filter.ts, shared/observability/metrics.ts
 * @public
 */

import type {
  IncomingMessage,
  RequestListener,
  ServerResponse,
} from "node:http";

import {
  type Logger,
  logRequestEnd,
  logRequestError,
} from "@/shared/observability/logging";
import {
  httpRequestDurationMs,
  httpRequestsTotal,
  statusBucket,
} from "@/shared/observability/metrics";

import type { Filter } from "./filter";
import type { Rejectable } from "./reject";
import type { Reply } from "./reply";
import { type Route, runWithRoute } from "./route";

/** Non-standard status recorded when the client went away first. */
const CLIENT_CLOSED_REQUEST = 499;

export interface RequestListenerDeps {
  log: Logger;
}

export class RequestAbandonedError extends Error {
  constructor() {
    super("Client closed the connection before the response was sent");
    this.name = "RequestAbandonedError";
  }
}

const ABSOLUTE_FORM = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Path of a request target as sent: no query or fragment, no dot-segment
 * or slash normalization. Only absolute-form targets go through URL parsing.
 */
export function pathFromTarget(target: string): string {
  if (ABSOLUTE_FORM.test(target)) {
    return new URL(target).pathname;
  }
  const end = target.search(/[?#]/);
  const path = end === -1 ? target : target.slice(0, end);
  return path === "" ? "/" : path;
}

export function routeFromIncomingMessage(
  req: IncomingMessage,
  signal: AbortSignal
): Route {

  const headers = new Headers();
  const raw = req.rawHeaders;
  for (let i = 0; i + 1 < raw.length; i += 2) {
    const name = raw[i];
    const value = raw[i + 1];
    if (name !== undefined && value !== undefined) {
      headers.append(name, value);
    }
  }

  const { remoteAddress, remotePort, remoteFamily } = req.socket;
  const remoteAddr =
    remoteAddress !== undefined && remotePort !== undefined
      ? {
          address: remoteAddress,
          port: remotePort,
          family: remoteFamily ?? "IPv4",
        }
      : undefined;

  return {
    method: req.method ?? "GET",
    fullPath: pathFromTarget(req.url ?? "/"),
    version: `HTTP/${req.httpVersion}`,
    remoteAddr,
    headers,
    signal,
  };
}

async function writeResponse(
  res: ServerResponse,
  response: Response
): Promise<void> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });
  const body = Buffer.from(await response.arrayBuffer());
  res.writeHead(response.status, headers);
  res.end(body);
}

async function handleRequest<R extends Reply, E extends Rejectable>(
  filter: Filter<R, E>,
  deps: RequestListenerDeps,
  req: IncomingMessage,
  res: ServerResponse
): Promise<void> {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort(new RequestAbandonedError());
  });

  const route = routeFromIncomingMessage(req, controller.signal);
  const log = deps.log.child({ method: route.method, path: route.fullPath });
  const start = performance.now();
  let status = 500;

  try {
    const result = await runWithRoute(route, () => filter.handle());
    const response = result.ok
      ? result.value.intoResponse()
      : result.error.intoResponse();
    status = response.status;
    await writeResponse(res, response);
  } catch (error) {
    if (controller.signal.aborted) {
      status = CLIENT_CLOSED_REQUEST;
      log.debug({ err: error }, "request abandoned");
      return;
    }

    status = 500;
    logRequestError(log, error, "INTERNAL_SERVER_ERROR");
    if (!res.headersSent) {
      res.writeHead(status, { "content-type": "text/plain; charset=utf-8" });
    }
    res.end("Internal server error");
  } finally {
    const durationMs = performance.now() - start;
    logRequestEnd(log, { status, durationMs });
    httpRequestsTotal.inc({ method: route.method, status: statusBucket(status) });
    httpRequestDurationMs.observe({ method: route.method }, durationMs);
  }
}

/**
 * Adapt a filter to `http.createServer`.
 *
 * @example
 * http.createServer(createRequestListener(routes, { log })).listen(3030);
 */
export function createRequestListener<R extends Reply, E extends Rejectable>(
  filter: Filter<R, E>,
  deps: RequestListenerDeps
): RequestListener {
  return (req, res) => {
    // handleRequest settles every path itself
    void handleRequest(filter, deps, req, res);
  };
}
