// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/observability/tracing/dispatcher.test`
 * Purpose: Unit tests for the global and scoped dispatcher registry.
 * Scope: setGlobalDispatcher once-only rule, withDispatcher override, shutdownDispatcher flush. Does NOT test sinks.
 * Invariants: Every test leaves the global slot empty.
 * Side-effects: global (dispatcher slot, restored in afterEach)
 * Links: shared/observability/tracing/dispatcher.ts
 * @internal
 */

import { RecordingDispatcher } from "@tests/_fakes/recording-dispatcher";
import { afterEach, describe, expect, it } from "vitest";

import {
  DispatcherAlreadySetError,
  getDispatcher,
  setGlobalDispatcher,
  shutdownDispatcher,
  withDispatcher,
} from "@/shared/observability/tracing";

describe("dispatcher registry", () => {
  afterEach(async () => {
    await shutdownDispatcher();
  });

  it("falls back to a dispatcher that enables nothing", () => {
    expect(
      getDispatcher().enabled({
        kind: "event",
        name: "event",
        target: "test",
        level: "error",
      })
    ).toBe(false);
  });

  it("refuses a second global dispatcher", () => {
    const first = new RecordingDispatcher();
    setGlobalDispatcher(first);

    expect(() => setGlobalDispatcher(new RecordingDispatcher())).toThrow(
      DispatcherAlreadySetError
    );
    expect(getDispatcher()).toBe(first);
  });

  it("lets a scoped dispatcher win inside its async scope only", async () => {
    const global = new RecordingDispatcher();
    const scoped = new RecordingDispatcher();
    setGlobalDispatcher(global);

    const inside = await withDispatcher(scoped, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return getDispatcher();
    });

    expect(inside).toBe(scoped);
    expect(getDispatcher()).toBe(global);
  });

  it("flushes and releases the global dispatcher on shutdown", async () => {
    const dispatcher = new RecordingDispatcher();
    setGlobalDispatcher(dispatcher);

    await shutdownDispatcher();

    expect(dispatcher.flushCount).toBe(1);
    expect(getDispatcher()).not.toBe(dispatcher);
    expect(() => setGlobalDispatcher(new RecordingDispatcher())).not.toThrow();
  });
});
