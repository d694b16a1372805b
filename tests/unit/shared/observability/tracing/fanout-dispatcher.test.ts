// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/observability/tracing/fanout-dispatcher.test`
 * Purpose: Unit tests for forwarding to several dispatchers with independent filters.
 * Side-effects: none
 * Links: shared/observability/tracing/fanout-dispatcher.ts
 * @internal
 */

import { RecordingDispatcher } from "@tests/_fakes/recording-dispatcher";
import { describe, expect, it } from "vitest";

import {
  createDiag,
  debugSpan,
  FanoutDispatcher,
  TargetFilter,
  withDispatcher,
} from "@/shared/observability/tracing";

describe("FanoutDispatcher", () => {
  it("forwards spans and events only to children that enable them", () => {
    const verbose = new RecordingDispatcher(TargetFilter.parse("trace"));
    const terse = new RecordingDispatcher(TargetFilter.parse("info"));
    const fanout = new FanoutDispatcher([verbose, terse]);
    const diag = createDiag("test");

    withDispatcher(fanout, () => {
      const span = debugSpan("work", { target: "test" });
      span.inScope(() => {
        diag.debug("detail");
        diag.info("summary");
      });
      span.record({ done: true });
      span.close();
    });

    expect(verbose.spans).toHaveLength(1);
    expect(verbose.spans[0]).toMatchObject({
      fields: { done: true },
      closeCount: 1,
    });
    expect(verbose.events.map((e) => e.message)).toEqual(["detail", "summary"]);

    expect(terse.spans).toEqual([]);
    expect(terse.events.map((e) => e.message)).toEqual(["summary"]);
  });

  it("flushes every child", async () => {
    const a = new RecordingDispatcher();
    const b = new RecordingDispatcher();

    await new FanoutDispatcher([a, b]).flush();

    expect([a.flushCount, b.flushCount]).toEqual([1, 1]);
  });
});
