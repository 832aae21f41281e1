#!/usr/bin/env node
import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  prefixedLogger,
} from "@linehttp/engine";
import { CliUsageError, HELP_TEXT, parseArgs } from "./args.js";
import { VERSION } from "./version.js";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (args.version) {
    console.log(VERSION);
    return;
  }

  const directory = path.resolve(args.directory);
  const logger = prefixedLogger(
    "linehttp",
    filteredLogger(args.logLevel, basicLogger()),
  );

  const config = {
    ...defaultConfig(directory),
    port: args.port,
    host: args.host,
    quiet: args.quiet,
  };

  const server = createNodeServer({ config, logger });
  const port = await server.start();

  logger.info(`Serving ${directory} on http://${config.host}:${port}`);

  const shutdown = () => {
    logger.info("Shutting down...");
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("Shutdown failed:", err);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  if (err instanceof CliUsageError) {
    console.error(err.message);
    console.error(HELP_TEXT);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
