#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import { loadConfig } from "./config/AppConfig.js";
import { RetentionMcpServer } from "./server.js";
import { logger } from "./utils/logger.js";

/**
 * Loads `.env` from the working directory, reads the configuration and
 * serves the retention tools over stdio.
 */
async function main() {
  dotenv.config();
  const config = loadConfig();
  logger.info("Configuration loaded", {
    rules: config.paths.rules,
    credentials: config.paths.credentials,
    markerPrefix: config.markerPrefix,
    processing: config.processing,
  });

  const server = new RetentionMcpServer({ config });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Error during shutdown:", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Rejection:", reason);
  });
  process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception:", error);
    process.exit(1);
  });
}

main().catch((error: unknown) => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});
