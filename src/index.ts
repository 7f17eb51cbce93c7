#!/usr/bin/env node
import dotenv from "dotenv";
import { createAdapter } from "./adapter";
import { loadConfig } from "./utils/config";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

async function startAdapter() {
  try {
    const config = loadConfig();
    logger.level = config.logLevel;
    logger.debug("Custom adapter starting", {
      tempDir: config.tempDir,
      httpTimeoutMs: config.httpTimeoutMs,
    });

    const session = createAdapter(
      config,
      { input: process.stdin, output: process.stdout },
      { logger },
    );

    const summary = await session.run();
    logger.info("Custom adapter stopped", summary);
    process.exit(0);
  } catch (error) {
    logger.error("Custom adapter failed:", error);
    process.exit(1);
  }
}

// The controller may kill us mid-transfer; there is nothing to flush.
process.on("SIGTERM", () => {
  logger.info("SIGTERM received, exiting");
  process.exit(0);
});

process.on("SIGINT", () => {
  logger.info("SIGINT received, exiting");
  process.exit(0);
});

void startAdapter();
