// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/level`
 * Purpose: Severity levels shared by spans and events.
 * Scope: Level union and priority table. Does not filter or emit anything.
 * Invariants: Priorities match pino's numeric levels (trace=10 … error=50); higher number = more severe.
 * Side-effects: none
 * Links: Used by span, events, TargetFilter, PinoDispatcher.
 * @public
 */

export const LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type Level = (typeof LEVELS)[number];

export const LEVEL_PRIORITY: Readonly<Record<Level, number>> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

export function isLevel(value: string): value is Level {
  return LEVELS.some((level) => level === value);
}

/** True when `level` is at least as severe as `threshold`. */
export function atLeast(level: Level, threshold: Level): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];
}
