import type { BatchCounts, PersistedOrder, RawOrderRecord } from "../../schema/src/index.js";

export type StoreState = "unconnected" | "connected" | "schema_ready" | "closed";

/**
 * OrderStore contract
 * - unconnected -> connected -> schema_ready -> closed
 * - rows are only ever added; order_id is never overwritten
 * - close() is always safe and never throws
 */
export type OrderStore = {
  readonly state: StoreState;

  connect(): void;
  ensureSchema(): void; // idempotent
  existingKeys(): Set<string>;

  /** Per-record failures are counted, never thrown. */
  insertBatch(records: readonly RawOrderRecord[]): BatchCounts;

  getOrder(order_id: string): PersistedOrder | null;
  countOrders(): number;

  close(): void;
};
