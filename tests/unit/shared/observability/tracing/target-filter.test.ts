// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/shared/observability/tracing/target-filter.test`
 * Purpose: Unit tests for LOG_FILTER directive parsing and matching.
 * Scope: Parse forms, longest-prefix matching, off, invalid directives.
 * Side-effects: none
 * Links: shared/observability/tracing/target-filter.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { InvalidFilterError, TargetFilter } from "@/shared/observability/tracing";

describe("TargetFilter", () => {
  it("applies a bare level to every target", () => {
    const filter = TargetFilter.parse("info");

    expect(filter.enabled("anything", "info")).toBe(true);
    expect(filter.enabled("anything", "error")).toBe(true);
    expect(filter.enabled("anything", "debug")).toBe(false);
  });

  it("turns unmatched targets off without a bare level", () => {
    const filter = TargetFilter.parse("example=info");

    expect(filter.enabled("example", "info")).toBe(true);
    expect(filter.enabled("other", "error")).toBe(false);
  });

  it("lets the longest matching target win", () => {
    const filter = TargetFilter.parse("app=warn,app.db=trace,info");

    expect(filter.enabled("app.db", "trace")).toBe(true);
    expect(filter.enabled("app.db.pool", "trace")).toBe(true);
    expect(filter.enabled("app.http", "info")).toBe(false);
    expect(filter.enabled("app.http", "warn")).toBe(true);
    expect(filter.enabled("elsewhere", "info")).toBe(true);
  });

  it("matches children separated by dot, colon or slash but not bare prefixes", () => {
    const filter = TargetFilter.parse("app=debug");

    expect(filter.enabled("app:worker", "debug")).toBe(true);
    expect(filter.enabled("app/worker", "debug")).toBe(true);
    expect(filter.enabled("application", "debug")).toBe(false);
  });

  it("accepts off, mixed case and surrounding whitespace", () => {
    const filter = TargetFilter.parse(" noisy = OFF , Debug ");

    expect(filter.enabled("noisy", "error")).toBe(false);
    expect(filter.enabled("quiet", "debug")).toBe(true);
  });

  it("treats an empty string as everything off", () => {
    expect(TargetFilter.parse("").enabled("x", "error")).toBe(false);
  });

  it.each(["verbose", "=info", "app=loud"])(
    "rejects the invalid directive %s",
    (directives) => {
      expect(() => TargetFilter.parse(directives)).toThrow(InvalidFilterError);
    }
  );

  it("enables everything from a level with atLevel", () => {
    const filter = TargetFilter.atLevel("debug");

    expect(filter.enabled("x", "debug")).toBe(true);
    expect(filter.enabled("x", "trace")).toBe(false);
  });
});
