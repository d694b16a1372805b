// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/otel`
 * Purpose: OpenTelemetry SDK start/stop for the process.
 * Scope: Initialize the NodeSDK once per process and shut it down on exit. Does NOT create spans (OtelDispatcher does).
 * Invariants:
 *   - OTel init happens ONLY here
 *   - Service name via OTEL_SERVICE_NAME env var (SDK reads it automatically)
 *   - No auto-instrumentation (explicit spans only, via the diagnostic dispatcher)
 * Side-effects: IO (OTel SDK global state initialization)
 * Links: bootstrap/tracing.ts, shared/observability/tracing/otel-dispatcher.ts
 * @public
 */

import { NodeSDK } from "@opentelemetry/sdk-node";

let sdk: NodeSDK | null = null;

export function startOtel(): void {
  if (sdk !== null) {
    return;
  }

  sdk = new NodeSDK({
    // Explicit spans only
    instrumentations: [],
  });
  sdk.start();
}

export async function stopOtel(): Promise<void> {
  if (sdk === null) {
    return;
  }
  const running = sdk;
  sdk = null;
  await running.shutdown();
}
