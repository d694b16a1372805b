// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/tracing/fields`
 * Purpose: Field value types and textual renderings for span and event fields.
 * Scope: Types plus display/debug renderers. Does not record fields anywhere.
 * Invariants: Field values are primitives so every dispatcher (pino JSON, OTel attributes) can carry them unchanged.
 * Side-effects: none
 * @public
 */

export type FieldValue = string | number | boolean;

export type Fields = Readonly<Record<string, FieldValue>>;

/**
 * Debug rendering of a value: strings are quoted and escaped, everything else
 * is rendered as-is. `debugValue("/hello")` → `"/hello"` (with the quotes).
 */
export function debugValue(value: FieldValue): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

/** Display rendering: the plain textual form. */
export function displayValue(value: FieldValue): string {
  return String(value);
}
