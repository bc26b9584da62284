// packages/ingest/src/sqlite-order-store.ts
import Database from "better-sqlite3";

import {
  classifyOrder,
  type BatchCounts,
  type InvalidOrder,
  type PersistedOrder,
  type RawOrderRecord,
  type RecordOutcome,
  type ValidOrder,
} from "../../schema/src/index.js";
import {
  connectionError,
  errorMessage,
  invalidState,
  queryError,
  schemaError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import type { OrderStore, StoreState } from "./order-store.js";
import { formatCounts, tallyOutcomes } from "./outcomes.js";

type InsertParams = [string, string, string, number, string];

export const ORDERS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS orders (
    order_id        TEXT PRIMARY KEY,
    status          TEXT NOT NULL,
    date            TIMESTAMP NOT NULL,
    amount          REAL NOT NULL,
    customer_region TEXT NOT NULL,
    loaded_at       TIMESTAMP DEFAULT CURRENT_TIMESTAMP
  );
`;

function isUniqueViolation(e: unknown): boolean {
  return (
    e instanceof Database.SqliteError &&
    (e.code === "SQLITE_CONSTRAINT_PRIMARYKEY" || e.code === "SQLITE_CONSTRAINT_UNIQUE")
  );
}

export class SqliteOrderStore implements OrderStore {
  private db: Database.Database | null = null;
  private insertStmt: Database.Statement<InsertParams> | null = null;
  private current: StoreState = "unconnected";
  private readonly log: Logger;

  constructor(
    private readonly filename: string,
    logger: Logger
  ) {
    this.log = logger.child({ component: "store" });
  }

  get state(): StoreState {
    return this.current;
  }

  private require(op: string, allowed: StoreState[]): Database.Database {
    if (!allowed.includes(this.current) || !this.db) {
      throw invalidState(op, this.current);
    }
    return this.db;
  }

  // ---------------- lifecycle ----------------

  connect(): void {
    if (this.current !== "unconnected") throw invalidState("connect", this.current);

    let db: Database.Database | null = null;
    try {
      db = new Database(this.filename);
      db.pragma("journal_mode = WAL");
    } catch (e) {
      db?.close();
      const err = connectionError(this.filename, e);
      this.log.error({ filename: this.filename }, err.message);
      throw err;
    }

    this.db = db;
    this.current = "connected";
    this.log.info({ filename: this.filename }, `connected to ${this.filename}`);
  }

  ensureSchema(): void {
    const db = this.require("ensureSchema", ["connected", "schema_ready"]);

    try {
      db.exec(ORDERS_TABLE_SQL);
      this.insertStmt = db.prepare<InsertParams>(`
        INSERT INTO orders (order_id, status, date, amount, customer_region)
        VALUES (?, ?, ?, ?, ?)
      `);
    } catch (e) {
      const err = schemaError(e);
      this.log.error(err.message);
      throw err;
    }

    this.current = "schema_ready";
    this.log.info("schema checked (table orders)");
  }

  close(): void {
    if (this.current === "closed") return;

    const db = this.db;
    this.db = null;
    this.insertStmt = null;
    this.current = "closed";

    if (!db) {
      this.log.debug("close() without an open connection");
      return;
    }

    try {
      db.close();
      this.log.info("connection closed");
    } catch (e) {
      this.log.warn({ err: e }, `error while closing ${this.filename}: ${errorMessage(e)}`);
    }
  }

  // ---------------- reads ----------------

  existingKeys(): Set<string> {
    const db = this.require("existingKeys", ["schema_ready"]);

    try {
      const rows = db.prepare<[], { order_id: string }>(`SELECT order_id FROM orders`).all();
      const ids = new Set(rows.map((r) => String(r.order_id)));
      this.log.debug({ count: ids.size }, `existing orders: ${ids.size}`);
      return ids;
    } catch (e) {
      const err = queryError("reading existing order_id values", e);
      this.log.error(err.message);
      throw err;
    }
  }

  getOrder(order_id: string): PersistedOrder | null {
    const db = this.require("getOrder", ["schema_ready"]);

    try {
      const row = db
        .prepare<[string], PersistedOrder>(
          `SELECT order_id, status, date, amount, customer_region, loaded_at
           FROM orders
           WHERE order_id = ?
           LIMIT 1`
        )
        .get(order_id);
      return row ?? null;
    } catch (e) {
      throw queryError(`reading order ${order_id}`, e);
    }
  }

  countOrders(): number {
    const db = this.require("countOrders", ["schema_ready"]);

    try {
      const row = db.prepare<[], { n: number }>(`SELECT count(*) AS n FROM orders`).get();
      return row ? Number(row.n) : 0;
    } catch (e) {
      throw queryError("counting orders", e);
    }
  }

  // ---------------- batch insert ----------------

  /**
   * Insert every new, valid record in one transaction.
   *
   * The baseline key query is the only fatal step; every per-record failure
   * (including a constraint violation the baseline did not predict) is
   * counted and the loop moves on.
   */
  insertBatch(records: readonly RawOrderRecord[]): BatchCounts {
    const db = this.require("insertBatch", ["schema_ready"]);
    const existing = this.existingKeys();

    const outcomes: RecordOutcome[] = [];
    const run = db.transaction(() => {
      for (const raw of records) {
        outcomes.push(this.processRecord(raw, existing));
      }
    });

    try {
      run();
    } catch (e) {
      const err = queryError("committing batch", e);
      this.log.error(err.message);
      throw err;
    }

    const counts = tallyOutcomes(outcomes);
    this.log.info(counts, `batch finished: ${formatCounts(counts)}`);
    return counts;
  }

  /** Single INSERT; loaded_at is left to the column default. */
  protected insertRow(order: ValidOrder): void {
    if (!this.insertStmt) throw invalidState("insertRow", this.current);
    this.insertStmt.run(order.order_id, order.status, order.date, order.amount, order.customer_region);
  }

  private processRecord(raw: RawOrderRecord, existing: Set<string>): RecordOutcome {
    try {
      const c = classifyOrder(raw, existing);

      if (c.kind === "invalid") return this.rejected(c, raw);

      if (c.kind === "duplicate") {
        this.log.debug({ order_id: c.order_id }, `duplicate skipped: order_id=${c.order_id}`);
        return { kind: "skipped", order_id: c.order_id, reason: "duplicate" };
      }

      const order = c.order;
      try {
        this.insertRow(order);
      } catch (e) {
        if (!isUniqueViolation(e)) throw e;

        existing.add(order.order_id);
        this.log.warn(
          { order_id: order.order_id, err: errorMessage(e) },
          `constraint violation on insert, skipped: order_id=${order.order_id}`
        );
        return { kind: "skipped", order_id: order.order_id, reason: "constraint" };
      }

      existing.add(order.order_id);
      this.log.debug({ order_id: order.order_id }, `loaded order_id=${order.order_id}`);
      return { kind: "inserted", order_id: order.order_id };
    } catch (e) {
      const message = errorMessage(e);
      this.log.error({ record: raw, err: message }, `failed to process record: ${message}`);
      return { kind: "error", order_id: null, reason: "unexpected", message };
    }
  }

  private rejected(c: InvalidOrder, raw: RawOrderRecord): RecordOutcome {
    const ctx = { order_id: c.order_id, reason: c.reason, field: c.field };

    if (c.reason === "invalid_date" || c.reason === "missing_region") {
      this.log.warn({ ...ctx, value: c.value }, `${c.message} (order_id=${c.order_id})`);
    } else {
      this.log.error({ ...ctx, record: raw }, c.message);
    }

    return { kind: "error", order_id: c.order_id, reason: c.reason, message: c.message };
  }
}
