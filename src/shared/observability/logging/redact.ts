// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Pino redaction paths for credentials that may reach a log line.
 * Scope: Static list only.
 * Side-effects: none
 * @public
 */

export const REDACT_PATHS = [
  "password",
  "token",
  "secret",
  "apiKey",
  // HTTP headers
  "headers.authorization",
  "headers.cookie",
  'headers["set-cookie"]',
  "req.headers.authorization",
  "req.headers.cookie",
];
