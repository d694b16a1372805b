// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/metrics`
 * Purpose: Prometheus metrics registry and HTTP metric definitions.
 * Scope: Shared observability singleton. Provides metrics registry and recording helpers. Does not serve the scrape endpoint (main.ts routes it).
 * Invariants: Single registry per process via globalThis; labels always low-cardinality.
 * Side-effects: global (module-scoped registry via globalThis)
 * Notes: Uses getOrCreate pattern to prevent duplicate registration errors during test reloads.
 * Links: Consumed by shared/http/server.ts.
 * @public
 */

import type { Counter, Histogram, Registry } from "prom-client";
import client from "prom-client";

// Singleton via globalThis to survive test reloads
const globalForMetrics = globalThis as typeof globalThis & {
  metricsRegistry?: Registry;
  metricsInitialized?: boolean;
};

export const metricsRegistry: Registry =
  globalForMetrics.metricsRegistry ?? new client.Registry();

if (!globalForMetrics.metricsInitialized) {
  globalForMetrics.metricsRegistry = metricsRegistry;
  globalForMetrics.metricsInitialized = true;

  metricsRegistry.setDefaultLabels({ app: "routetrace" });
  client.collectDefaultMetrics({ register: metricsRegistry });
}

function getOrCreateCounter<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[]
): Counter<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames,
    registers: [metricsRegistry],
  });
}

function getOrCreateHistogram<T extends string>(
  name: string,
  help: string,
  labelNames: readonly T[],
  buckets: number[]
): Histogram<T> {
  const existing = metricsRegistry.getSingleMetric(name);
  if (existing) return existing as Histogram<T>;
  return new client.Histogram({
    name,
    help,
    labelNames,
    buckets,
    registers: [metricsRegistry],
  });
}

export const httpRequestsTotal = getOrCreateCounter(
  "http_requests_total",
  "Total number of HTTP requests",
  ["method", "status"] as const
);

export const httpRequestDurationMs = getOrCreateHistogram(
  "http_request_duration_ms",
  "HTTP request duration in milliseconds",
  ["method"] as const,
  [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000]
);

/**
 * Map HTTP status code to bucket for low-cardinality label.
 */
export function statusBucket(status: number): "2xx" | "3xx" | "4xx" | "5xx" {
  if (status >= 200 && status < 300) return "2xx";
  if (status >= 300 && status < 400) return "3xx";
  if (status >= 400 && status < 500) return "4xx";
  return "5xx";
}
