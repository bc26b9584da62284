#!/usr/bin/env node
// packages/ingest/src/cli/order-loader.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import { pathToFileURL } from "node:url";

import type { DestinationStream } from "pino";

import { resolveLoaderConfig, type Env, type LoaderConfig } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { formatCounts } from "../outcomes.js";
import { runOrderLoad } from "../run.js";

function usage(): string {
  return `order-loader - load orders from a JSON file into SQLite

Usage:
  order-loader --help
  order-loader version

  order-loader [<orders.json>] [--db <path>] [--log-file <path>]

Environment:
  ORDER_LOADER_INPUT      input file       (default orders-1.json)
  ORDER_LOADER_DB         SQLite database  (default orders.db)
  ORDER_LOADER_LOG_FILE   debug log file   (default orders_loader.log)

Examples:
  order-loader orders-1.json
  order-loader ./data/orders.json --db ./orders.db --log-file ./load.log
`;
}

export type CliOptions = {
  env?: Env;
  /** Console log sink; stdout when omitted. */
  console?: DestinationStream;
};

/** Returns the process exit code. */
export function run(argv: string[] = process.argv, opts: CliOptions = {}): number {
  const args = argv.slice(2);

  if (args.includes("--help") || args.includes("-h")) {
    process.stdout.write(usage());
    return 0;
  }

  if (args[0] === "version") {
    process.stdout.write("order-loader cli v1\n");
    return 0;
  }

  let config: LoaderConfig;
  try {
    config = resolveLoaderConfig(args, opts.env ?? process.env);
  } catch (e) {
    console.error(`[order-loader] ${errorMessage(e)}\n`);
    console.error(usage());
    return 1;
  }

  const logger = createLogger({ logFile: config.log_file, console: opts.console });

  try {
    const counts = runOrderLoad({ config, logger });
    console.log(`[order-loader] ${formatCounts(counts)}`);
    return 0;
  } catch (e) {
    console.error(`[order-loader] ${errorMessage(e)}`);
    return 1;
  }
}

// Entrypoint: run when this file is the invoked script (node, npm bin link or tsx)
function invokedDirectly(): boolean {
  const argv1 = process.argv[1];
  if (!argv1 || !fs.existsSync(argv1)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(argv1)).href;
}

if (invokedDirectly()) {
  process.exitCode = run(process.argv);
}
