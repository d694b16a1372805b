// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/env/server.test`
 * Purpose: Unit tests for server env validation.
 * Scope: Defaults, coercion, boolean strings, LOG_FILTER validation and EnvValidationError shape. Does NOT read a .env file.
 * Invariants: Each test stubs its own env; setup.ts unstubs and resets the cache afterwards.
 * Side-effects: process.env (stubbed)
 * Links: src/shared/env/server.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import { EnvValidationError, resetServerEnv, serverEnv } from "@/shared/env";
import { TargetFilter } from "@/shared/observability/tracing";

describe("serverEnv", () => {
  it("applies defaults", () => {
    vi.stubEnv("HOST", undefined);
    vi.stubEnv("PORT", undefined);
    vi.stubEnv("LOG_FILTER", undefined);
    vi.stubEnv("OTEL_ENABLED", undefined);

    const env = serverEnv();

    expect(env).toMatchObject({
      NODE_ENV: "test",
      HOST: "127.0.0.1",
      PORT: 3030,
      LOG_FILTER: "example=info,routetrace=debug",
      OTEL_ENABLED: false,
      isTest: true,
      isDev: false,
      isProd: false,
    });
  });

  it("shows context spans and outcomes under the default filter", () => {
    vi.stubEnv("LOG_FILTER", undefined);

    const filter = TargetFilter.parse(serverEnv().LOG_FILTER);

    expect(filter.enabled("routetrace", "debug")).toBe(true);
    expect(filter.enabled("routetrace", "trace")).toBe(false);
    expect(filter.enabled("example", "info")).toBe(true);
    expect(filter.enabled("example", "debug")).toBe(false);
    expect(filter.enabled("other", "error")).toBe(false);
  });

  it("coerces the port and parses boolean strings", () => {
    vi.stubEnv("PORT", "8080");
    vi.stubEnv("OTEL_ENABLED", "1");
    vi.stubEnv("LOG_FILTER", "example=info,routetrace=debug");

    const env = serverEnv();

    expect(env.PORT).toBe(8080);
    expect(env.OTEL_ENABLED).toBe(true);
    expect(env.LOG_FILTER).toBe("example=info,routetrace=debug");
  });

  it("caches until reset", () => {
    vi.stubEnv("PORT", "4000");
    expect(serverEnv().PORT).toBe(4000);

    vi.stubEnv("PORT", "5000");
    expect(serverEnv().PORT).toBe(4000);

    resetServerEnv();
    expect(serverEnv().PORT).toBe(5000);
  });

  it("reports every invalid key", () => {
    vi.stubEnv("PORT", "99999");
    vi.stubEnv("LOG_FILTER", "app=loud");
    vi.stubEnv("OTEL_ENABLED", "yes");

    let caught: unknown;
    try {
      serverEnv();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EnvValidationError);
    if (!(caught instanceof EnvValidationError)) return;
    expect(caught.meta.code).toBe("INVALID_ENV");
    expect(caught.meta.missing).toEqual([]);
    expect([...caught.meta.invalid].sort()).toEqual([
      "LOG_FILTER",
      "OTEL_ENABLED",
      "PORT",
    ]);
  });
});
