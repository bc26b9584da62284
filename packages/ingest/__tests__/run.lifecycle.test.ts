import * as path from "node:path";

import { describe, expect, it } from "vitest";

import type { LoaderConfig } from "../src/config.js";
import { schemaError } from "../src/errors.js";
import { createLogger, createSilentLogger } from "../src/logger.js";
import { runOrderLoad } from "../src/run.js";
import { SqliteOrderStore } from "../src/sqlite-order-store.js";
import { captureStream, expectLoadError, makeTempDir, order, readLogFile, writeJson } from "./_helpers/capture.js";

class SchemaFailStore extends SqliteOrderStore {
  override ensureSchema(): void {
    throw schemaError(new Error("disk full"));
  }
}

function setup(records: unknown[] = [order()]) {
  const dir = makeTempDir();
  const config: LoaderConfig = {
    input: writeJson(dir, "orders-1.json", records),
    db: path.join(dir, "orders.db"),
    log_file: path.join(dir, "orders_loader.log"),
  };
  const sink = captureStream();
  const logger = createLogger({ logFile: config.log_file, console: sink });
  return { dir, config, sink, logger };
}

describe("runOrderLoad", () => {
  it("loads a file end to end and logs the summary", () => {
    const { config, sink, logger } = setup([
      order(),
      order({ status: "refunded" }),
      order({ order_id: "B2", date: "not-a-date" }),
    ]);

    expect(runOrderLoad({ config, logger })).toEqual({ inserted: 1, skipped: 1, errors: 1 });

    const consoleMsgs = sink.lines().map((l) => l.msg);
    expect(consoleMsgs).toContain("inserted=1, skipped=1, errors=1");
    expect(consoleMsgs).not.toContain("duplicate skipped: order_id=A1");
    expect(consoleMsgs[consoleMsgs.length - 1]).toBe("done");

    const fileMsgs = readLogFile(config.log_file).map((l) => l.msg);
    expect(fileMsgs).toContain("duplicate skipped: order_id=A1");
    expect(fileMsgs).toContain("invalid date 'not-a-date' (order_id=B2)");

    const check = new SqliteOrderStore(config.db, createSilentLogger());
    check.connect();
    check.ensureSchema();
    expect(check.countOrders()).toBe(1);
    expect(check.getOrder("A1")?.status).toBe("paid");
    check.close();
  });

  it("closes the store and rethrows when the input is missing", () => {
    const { dir, config, sink, logger } = setup();
    const missing = path.join(dir, "missing.json");
    const store = new SqliteOrderStore(config.db, logger);

    expectLoadError(() => runOrderLoad({ config: { ...config, input: missing }, logger, store }), "NOT_FOUND");

    expect(store.state).toBe("closed");
    const fatal = sink.lines().find((l) => l.level === "error" && l.component === "run");
    expect(fatal?.msg).toBe(`fatal: NOT_FOUND: file not found: ${missing}`);
  });

  it("fails with CONNECTION_ERROR when the database directory is missing", () => {
    const { dir, config, logger } = setup();
    const store = new SqliteOrderStore(path.join(dir, "nope", "orders.db"), logger);

    expectLoadError(() => runOrderLoad({ config, logger, store }), "CONNECTION_ERROR");
    expect(store.state).toBe("closed");
  });

  it("releases the connection when schema setup fails", () => {
    const { config, logger } = setup();
    const store = new SchemaFailStore(config.db, logger);

    expectLoadError(() => runOrderLoad({ config, logger, store }), "SCHEMA_ERROR");
    expect(store.state).toBe("closed");
  });
});
