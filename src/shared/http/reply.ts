// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/reply`
 * Purpose: Reply contract (anything that materializes into a fetch Response) and common reply builders.
 * Scope: Builders for text/json bodies and status/header overrides. Does not write to sockets.
 * Invariants: intoResponse() may be called once per reply; builders create a fresh Response per call.
 * Side-effects: none
 * @public
 */

export interface Reply {
  intoResponse(): Response;
}

export function text(body: string, status = 200): Reply {
  return {
    intoResponse: () =>
      new Response(body, {
        status,
        headers: { "content-type": "text/plain; charset=utf-8" },
      }),
  };
}

export function json(value: unknown, status = 200): Reply {
  return {
    intoResponse: () => Response.json(value, { status }),
  };
}

export function withStatus(reply: Reply, status: number): Reply {
  return {
    intoResponse: () => {
      const response = reply.intoResponse();
      return new Response(response.body, { status, headers: response.headers });
    },
  };
}

export function withHeader(reply: Reply, name: string, value: string): Reply {
  return {
    intoResponse: () => {
      const response = reply.intoResponse();
      const headers = new Headers(response.headers);
      headers.set(name, value);
      return new Response(response.body, {
        status: response.status,
        headers,
      });
    },
  };
}
