// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@main`
 * Purpose: Example server entry point with graceful shutdown.
 * Scope: Reads env, installs the dispatcher, serves the example routes. Does not contain route logic.
 * Invariants:
 *   - Dispatcher installed before the server accepts requests
 *   - SIGTERM/SIGINT close the server, stop OTel, flush the dispatcher
 * Side-effects: IO (socket listen, process signals)
 * Links: app/routes.ts, bootstrap/tracing.ts, bootstrap/otel.ts
 * @public
 */

import http from "node:http";

import { makeRoutes } from "@/app/routes";
import { startOtel, stopOtel } from "@/bootstrap/otel";
import { initTracing } from "@/bootstrap/tracing";
import { serverEnv } from "@/shared/env";
import { createRequestListener } from "@/shared/http";
import { makeLogger, shutdownDispatcher } from "@/shared/observability";

async function main(): Promise<void> {
  const config = serverEnv();
  const logger = makeLogger({ component: "server" });

  if (config.OTEL_ENABLED) {
    startOtel();
  }
  initTracing(config);

  const server = http.createServer(
    createRequestListener(makeRoutes(), { log: logger })
  );

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.PORT, config.HOST, () => resolve());
  });
  logger.info(
    { host: config.HOST, port: config.PORT, logFilter: config.LOG_FILTER },
    "server listening"
  );

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "Received signal, shutting down");

    try {
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
      await stopOtel();
      await shutdownDispatcher();
      logger.flush();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      logger.flush();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  bootLogger.flush();
  process.exit(1);
});
