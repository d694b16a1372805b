// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/reject`
 * Purpose: Typed, status-bearing request rejections.
 * Scope: Rejectable contract, Rejection class and common constructors. Does not recover or remap rejections.
 * Invariants:
 *   - status is the externally visible HTTP status
 *   - toDebugString() is never empty and always contains the cause text
 *   - Route handlers throw a Rejection; filters turn it into err(rejection)
 * Side-effects: none
 * Links: filter.ts, trace/with-trace.ts
 * @public
 */

import { debugValue } from "@/shared/observability/tracing";

import type { Reply } from "./reply";

/** What the tracing layer and the server adapter need from a rejection. */
export interface Rejectable extends Reply {
  readonly status: number;
  toDebugString(): string;
}

export class Rejection extends Error implements Rejectable {
  readonly status: number;

  constructor(status: number, cause: string | Error) {
    super(typeof cause === "string" ? cause : cause.message, { cause });
    this.name = "Rejection";
    this.status = status;
  }

  /** e.g. `Rejection { status: 404, cause: "not found" }` */
  toDebugString(): string {
    const cause =
      this.cause instanceof Error
        ? `${this.cause.name}: ${this.cause.message}`
        : this.message;
    return `Rejection { status: ${this.status}, cause: ${debugValue(cause)} }`;
  }

  intoResponse(): Response {
    return new Response(this.message, {
      status: this.status,
      headers: { "content-type": "text/plain; charset=utf-8" },
    });
  }
}

export function reject(status: number, cause: string | Error): Rejection {
  return new Rejection(status, cause);
}

export function notFound(): Rejection {
  return new Rejection(404, "not found");
}

export function methodNotAllowed(): Rejection {
  return new Rejection(405, "method not allowed");
}

export function isRejection(value: unknown): value is Rejection {
  return value instanceof Rejection;
}
