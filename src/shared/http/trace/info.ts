// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/trace/info`
 * Purpose: Read-only view of the current request handed to span factories.
 * Scope: Accessors over a Route. Does not copy or mutate the route.
 * Invariants:
 *   - Built per request by the trace decorator; factories must not keep it
 *   - referer/userAgent/host return undefined when the header is absent or not text (visible ASCII, space, tab)
 * Side-effects: none
 * Links: route.ts, trace.ts
 * @public
 */

import type { HttpVersion, ReadonlyHeaders, RemoteAddr, Route } from "../route";

const TEXT_HEADER_VALUE = /^[\t\x20-\x7e]*$/;

export class RequestInfo {
  constructor(private readonly route: Route) {}

  remoteAddr(): RemoteAddr | undefined {
    return this.route.remoteAddr;
  }

  method(): string {
    return this.route.method;
  }

  path(): string {
    return this.route.fullPath;
  }

  version(): HttpVersion {
    return this.route.version;
  }

  referer(): string | undefined {
    return this.textHeader("referer");
  }

  userAgent(): string | undefined {
    return this.textHeader("user-agent");
  }

  host(): string | undefined {
    return this.textHeader("host");
  }

  headers(): ReadonlyHeaders {
    return this.route.headers;
  }

  private textHeader(name: string): string | undefined {
    const value = this.route.headers.get(name);
    if (value === null || !TEXT_HEADER_VALUE.test(value)) return undefined;
    return value;
  }
}
