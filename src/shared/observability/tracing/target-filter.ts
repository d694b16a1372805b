// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/target-filter`
 * Purpose: Per-target level filter parsed from a directive string such as `example=info,routetrace=debug`.
 * Scope: Parse directives and answer enabled(target, level). Does not read env.
 * Invariants:
 *   - Directive forms: `target=level`, bare `level` (default for unmatched targets), level may be `off`
 *   - Longest matching target wins; a target matches itself and dotted/colon/slash-separated children
 *   - Without a bare level, unmatched targets are off
 * Side-effects: none
 * Links: PinoDispatcher, shared/env/server.ts (LOG_FILTER)
 * @public
 */

import { atLeast, isLevel, type Level } from "./level";

type Threshold = Level | "off";

interface Directive {
  readonly target: string;
  readonly threshold: Threshold;
}

export class InvalidFilterError extends Error {
  constructor(readonly directive: string) {
    super(`Invalid log filter directive: "${directive}"`);
    this.name = "InvalidFilterError";
  }
}

function parseThreshold(raw: string, directive: string): Threshold {
  const value = raw.trim().toLowerCase();
  if (value === "off" || isLevel(value)) return value;
  throw new InvalidFilterError(directive);
}

function matches(target: string, prefix: string): boolean {
  if (target === prefix) return true;
  if (!target.startsWith(prefix)) return false;
  const next = target.charAt(prefix.length);
  return next === "." || next === ":" || next === "/";
}

export class TargetFilter {
  private constructor(
    private readonly directives: readonly Directive[],
    private readonly fallback: Threshold
  ) {}

  static parse(source: string): TargetFilter {
    const directives: Directive[] = [];
    let fallback: Threshold = "off";

    for (const part of source.split(",")) {
      const directive = part.trim();
      if (directive === "") continue;

      const eq = directive.indexOf("=");
      if (eq === -1) {
        fallback = parseThreshold(directive, directive);
        continue;
      }

      const target = directive.slice(0, eq).trim();
      if (target === "") throw new InvalidFilterError(directive);
      directives.push({
        target,
        threshold: parseThreshold(directive.slice(eq + 1), directive),
      });
    }

    directives.sort((a, b) => b.target.length - a.target.length);
    return new TargetFilter(directives, fallback);
  }

  /** Enables every target at `level` and above. */
  static atLevel(level: Level): TargetFilter {
    return new TargetFilter([], level);
  }

  enabled(target: string, level: Level): boolean {
    const directive = this.directives.find((d) => matches(target, d.target));
    const threshold = directive?.threshold ?? this.fallback;
    return threshold !== "off" && atLeast(level, threshold);
  }
}
