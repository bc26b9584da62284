import type { BatchCounts } from "../../schema/src/index.js";
import type { LoaderConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { loadOrders } from "./loader.js";
import type { Logger } from "./logger.js";
import type { OrderStore } from "./order-store.js";
import { formatCounts } from "./outcomes.js";
import { SqliteOrderStore } from "./sqlite-order-store.js";

export type RunOrderLoadParams = {
  config: LoaderConfig;
  logger: Logger;
  /** Defaults to a SqliteOrderStore on config.db. */
  store?: OrderStore;
};

const RULE = "=".repeat(70);

/**
 * One sequential pass: open store, ensure schema, load input, insert, close.
 * The store is closed on every exit path; fatal errors are logged and rethrown.
 */
export function runOrderLoad(params: RunOrderLoadParams): BatchCounts {
  const { config, logger } = params;
  const log = logger.child({ component: "run" });
  const store = params.store ?? new SqliteOrderStore(config.db, logger);

  log.info(RULE);
  log.info({ input: config.input, db: config.db }, "order load started");
  log.info(RULE);

  try {
    store.connect();
    store.ensureSchema();

    const records = loadOrders(config.input, logger);
    const counts = store.insertBatch(records);

    log.info(counts, formatCounts(counts));
    return counts;
  } catch (e) {
    log.error({ err: e }, `fatal: ${errorMessage(e)}`);
    throw e;
  } finally {
    store.close();
    log.info("done");
  }
}
