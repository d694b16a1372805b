// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@app/routes`
 * Purpose: Example route tree: /hello and /goodbye each in their own context span, all under a request span.
 * Scope: Route composition only. Does not start a server.
 * Invariants: Every route runs inside request() → context(name) spans; /metrics serves the Prometheus registry.
 * Side-effects: IO (diagnostic events)
 * Links: main.ts, shared/http/trace
 * @public
 */

import {
  context,
  type Filter,
  request,
  route,
  text,
  type Traced,
  withHeader,
} from "@/shared/http";
import { createDiag, metricsRegistry } from "@/shared/observability";

export const EXAMPLE_TARGET = "example";

const diag = createDiag(EXAMPLE_TARGET);

export function makeRoutes(): Filter<Traced> {
  const hello = route("GET", "/hello", () => {
    diag.info("saying hello...");
    return text("Hello, World!");
  }).with(context("hello"));

  const goodbye = route("GET", "/goodbye", () => {
    diag.info("saying goodbye...");
    return text("So long and thanks for all the fish!");
  }).with(context("goodbye"));

  const metrics = route("GET", "/metrics", async () =>
    withHeader(
      text(await metricsRegistry.metrics()),
      "content-type",
      metricsRegistry.contentType
    )
  );

  return hello.or(goodbye).or(metrics).with(request());
}
