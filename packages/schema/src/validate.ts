import { z } from "zod";

import type {
  InvalidOrder,
  OrderClassification,
  RawOrderRecord,
  RequiredOrderField,
} from "./schema.js";
import { parseIsoTimestamp } from "./timestamp.js";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const FiniteNumber = z
  .number()
  .refine(Number.isFinite, "Must be a finite number");

/* ------------------------------------------------------------------ */
/*                                Order                               */
/* ------------------------------------------------------------------ */

export const REQUIRED_ORDER_FIELDS: readonly RequiredOrderField[] = [
  "order_id",
  "status",
  "date",
  "amount",
];

export const OrderIdSchema = z.string().min(1, "Must be a non-empty string");

export const OrderFieldsSchema = z.object({
  status: z.string(),
  date: z.string(),
  amount: FiniteNumber,
});

export const CustomerRegionSchema = z.string();

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isAbsent(v: unknown): v is null | undefined {
  return v === undefined || v === null;
}

function firstMessage(error: z.ZodError): string {
  return error.issues[0]?.message ?? "invalid";
}

function invalid(
  order_id: string | null,
  reason: InvalidOrder["reason"],
  message: string,
  extra: { field?: string; value?: unknown } = {}
): InvalidOrder {
  return { kind: "invalid", order_id, reason, message, ...extra };
}

/**
 * Decide what to do with one raw record, in this order:
 *
 * 1. required top-level fields present, order_id a non-empty string
 * 2. order_id not already known
 * 3. status / date / amount well-typed
 * 4. date parses as ISO-8601
 * 5. customer.region present (a string, possibly empty)
 *
 * `null` counts as absent. A known order_id is a duplicate whatever the
 * rest of the record looks like. Nothing here touches the database; the
 * caller owns `existing` and must add keys to it after a successful insert.
 */
export function classifyOrder(
  raw: RawOrderRecord,
  existing: ReadonlySet<string>
): OrderClassification {
  if (!isRecord(raw)) {
    return invalid(null, "not_an_object", "record is not a JSON object", { value: raw });
  }

  const rawId = typeof raw.order_id === "string" ? raw.order_id : null;

  for (const field of REQUIRED_ORDER_FIELDS) {
    if (isAbsent(raw[field])) {
      return invalid(rawId, "missing_field", `missing required field '${field}'`, { field });
    }
  }

  const id = OrderIdSchema.safeParse(raw.order_id);
  if (!id.success) {
    return invalid(rawId, "invalid_field", `invalid field 'order_id': ${firstMessage(id.error)}`, {
      field: "order_id",
      value: raw.order_id,
    });
  }

  const order_id = id.data;

  if (existing.has(order_id)) {
    return { kind: "duplicate", order_id };
  }

  const parsed = OrderFieldsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? String(issue.path[0] ?? "") : "";
    return invalid(order_id, "invalid_field", `invalid field '${field}': ${firstMessage(parsed.error)}`, {
      field,
      value: raw[field],
    });
  }

  const fields = parsed.data;

  const date = parseIsoTimestamp(fields.date);
  if (date === null) {
    return invalid(order_id, "invalid_date", `invalid date '${fields.date}'`, {
      field: "date",
      value: fields.date,
    });
  }

  const region = isRecord(raw.customer) ? raw.customer.region : undefined;
  if (isAbsent(region)) {
    return invalid(order_id, "missing_region", "missing customer.region", {
      field: "customer.region",
      value: raw.customer,
    });
  }

  const customer_region = CustomerRegionSchema.safeParse(region);
  if (!customer_region.success) {
    return invalid(order_id, "invalid_field", `invalid field 'customer.region': ${firstMessage(customer_region.error)}`, {
      field: "customer.region",
      value: region,
    });
  }

  return {
    kind: "valid",
    order: {
      order_id,
      status: fields.status,
      date,
      amount: fields.amount,
      customer_region: customer_region.data,
    },
  };
}
