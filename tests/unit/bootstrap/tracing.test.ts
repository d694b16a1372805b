// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/bootstrap/tracing.test`
 * Purpose: Unit tests for dispatcher composition and global installation.
 * Scope: makeDispatcher sink selection and filter wiring, initTracing once-only install. Does NOT start the OTel SDK.
 * Side-effects: global (dispatcher slot, released in afterEach)
 * Links: src/bootstrap/tracing.ts
 * @internal
 */

import { afterEach, describe, expect, it } from "vitest";

import { initTracing, makeDispatcher } from "@/bootstrap/tracing";
import {
  DispatcherAlreadySetError,
  FanoutDispatcher,
  getDispatcher,
  makeNoopLogger,
  PinoDispatcher,
  shutdownDispatcher,
} from "@/shared/observability";

describe("bootstrap/tracing", () => {
  afterEach(async () => {
    await shutdownDispatcher();
  });

  it("uses only pino when OTel is disabled", () => {
    const dispatcher = makeDispatcher(
      { LOG_FILTER: "example=info", OTEL_ENABLED: false },
      makeNoopLogger()
    );

    expect(dispatcher).toBeInstanceOf(PinoDispatcher);
    expect(
      dispatcher.enabled({ kind: "event", name: "event", target: "example", level: "info" })
    ).toBe(true);
    expect(
      dispatcher.enabled({ kind: "event", name: "event", target: "other", level: "error" })
    ).toBe(false);
  });

  it("fans out to pino and OTel when OTel is enabled", () => {
    const dispatcher = makeDispatcher(
      { LOG_FILTER: "info", OTEL_ENABLED: true },
      makeNoopLogger()
    );

    expect(dispatcher).toBeInstanceOf(FanoutDispatcher);
  });

  it("installs the dispatcher once", () => {
    const env = { LOG_FILTER: "info", OTEL_ENABLED: false };

    const dispatcher = initTracing(env, makeNoopLogger());

    expect(getDispatcher()).toBe(dispatcher);
    expect(() => initTracing(env, makeNoopLogger())).toThrow(
      DispatcherAlreadySetError
    );
  });
});
