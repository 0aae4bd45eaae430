/**
 * Attendance ledger server
 *
 * Reads configuration once, opens the configured ledger storage and serves
 * the RPC router over HTTP.
 */

import { SessionStore } from "@attendance/api";
import { createBackend, createRepositories } from "@attendance/db";
import { loadAppConfig } from "@attendance/env";
import { logger } from "@attendance/shared/logger";

import { close, createAppServer, listen } from "./app";

async function start() {
  try {
    const config = loadAppConfig();
    const backend = createBackend(config);
    const server = createAppServer({
      repos: createRepositories(backend),
      sessions: new SessionStore(),
      config,
    });

    const port = await listen(server, config.port);
    logger.info(`Attendance server is running on port ${port}`);
    logger.info(`Storage: ${backend.kind}`);

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down`);
      Promise.all([close(server), backend.close()])
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("Shutdown failed:", error);
          process.exit(1);
        });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } catch (error) {
    logger.error("Failed to start server:", error);
    process.exit(1);
  }
}

void start();
