// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/observability/tracing/pino-dispatcher.test`
 * Purpose: Unit tests for writing diagnostic events as pino log lines.
 * Scope: Line shape (target, fields, span, spans, msg), level mapping, filtering, flush. Uses an in-memory pino stream.
 * Side-effects: none
 * Links: shared/observability/tracing/pino-dispatcher.ts
 * @internal
 */

import pino from "pino";
import { describe, expect, it } from "vitest";

import {
  createDiag,
  debugSpan,
  infoSpan,
  PinoDispatcher,
  TargetFilter,
  withDispatcher,
} from "@/shared/observability/tracing";

function capture(): { lines: Record<string, unknown>[]; log: pino.Logger } {
  const lines: Record<string, unknown>[] = [];
  const log = pino(
    { level: "trace", base: undefined, timestamp: false },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    }
  );
  return { lines, log };
}

describe("PinoDispatcher", () => {
  it("writes events with the active span and its ancestry", () => {
    const { lines, log } = capture();
    const dispatcher = new PinoDispatcher(log, TargetFilter.parse("trace"));
    const diag = createDiag("example");

    withDispatcher(dispatcher, () => {
      const outer = infoSpan("request", {
        target: "routetrace",
        fields: { method: "GET" },
      });
      outer.inScope(() => {
        const inner = debugSpan("context", {
          target: "routetrace",
          fields: { message: "hello" },
        });
        inner.inScope(() => diag.info("saying hello...", { n: 1 }));
      });
    });

    expect(lines).toEqual([
      {
        level: 30,
        target: "example",
        n: 1,
        span: { name: "context", message: "hello" },
        spans: [
          { name: "request", method: "GET" },
          { name: "context", message: "hello" },
        ],
        msg: "saying hello...",
      },
    ]);
  });

  it("writes events without a span or message as bare field lines", () => {
    const { lines, log } = capture();
    const dispatcher = new PinoDispatcher(log, TargetFilter.parse("trace"));

    withDispatcher(dispatcher, () => {
      createDiag("example").event("debug", { "response.status": 200 });
    });

    expect(lines).toEqual([
      { level: 20, target: "example", "response.status": 200 },
    ]);
  });

  it("drops events the filter disables", () => {
    const { lines, log } = capture();
    const dispatcher = new PinoDispatcher(log, TargetFilter.parse("example=warn"));

    withDispatcher(dispatcher, () => {
      const diag = createDiag("example");
      diag.info("quiet");
      diag.error("loud");
      createDiag("other").error("elsewhere");
    });

    expect(lines.map((line) => line.msg)).toEqual(["loud"]);
    expect(lines[0]?.level).toBe(50);
  });

  it("flushes through the logger", async () => {
    const { log } = capture();
    const dispatcher = new PinoDispatcher(log, TargetFilter.parse("info"));

    await expect(dispatcher.flush()).resolves.toBeUndefined();
  });
});
