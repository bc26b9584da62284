// Order Record Schema
// Types only. No functions.

export type ISO8601 = string;

/* ------------------------------ Input ------------------------------- */

/**
 * One element of the input JSON array, untouched.
 * Stays `unknown` until `classifyOrder` has looked at it.
 */
export type RawOrderRecord = unknown;

/* --------------------------- Validated ------------------------------ */

export interface ValidOrder {
  order_id: string;
  status: string;
  date: ISO8601; // normalized, see parseIsoTimestamp
  amount: number;
  customer_region: string; // flattened from customer.region
}

export interface PersistedOrder extends ValidOrder {
  loaded_at: string; // assigned by the database at insert time
}

/* ---------------------------- Outcomes ------------------------------ */

export type RequiredOrderField = "order_id" | "status" | "date" | "amount";

export type InvalidOrderReason =
  | "not_an_object"
  | "missing_field"
  | "invalid_field"
  | "invalid_date"
  | "missing_region";

export type InvalidOrder = {
  kind: "invalid";
  order_id: string | null;
  reason: InvalidOrderReason;
  field?: string;
  value?: unknown;
  message: string;
};

export type OrderClassification =
  | { kind: "valid"; order: ValidOrder }
  | { kind: "duplicate"; order_id: string }
  | InvalidOrder;

export type SkipReason = "duplicate" | "constraint";

export type RecordOutcome =
  | { kind: "inserted"; order_id: string }
  | { kind: "skipped"; order_id: string; reason: SkipReason }
  | {
      kind: "error";
      order_id: string | null;
      reason: InvalidOrderReason | "unexpected";
      message: string;
    };

export type BatchCounts = {
  inserted: number;
  skipped: number;
  errors: number;
};
