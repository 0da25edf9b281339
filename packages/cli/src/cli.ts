#!/usr/bin/env node

import createDebug from "debug";
import { createLogger, readLoggerEnv } from "@autolayer/logger";
import { USAGE, parseArgs } from "./args";
import { runGenerate } from "./run";

const debug = createDebug("autolayer:cli");

function main(): void {
  const parsed = parseArgs(process.argv);
  if (parsed.help) {
    process.stdout.write(USAGE + "\n");
    return;
  }

  const logger = createLogger(readLoggerEnv());
  debug("cli: config %o", parsed.config);
  runGenerate(parsed.config, logger, (text) => process.stdout.write(text));
}

try {
  main();
} catch (error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(JSON.stringify({ error: message }) + "\n");
  process.exitCode = 1;
}
