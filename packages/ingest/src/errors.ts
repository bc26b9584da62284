export type OrderLoadErrorCode =
  | "NOT_FOUND"
  | "PARSE_ERROR"
  | "READ_ERROR"
  | "CONNECTION_ERROR"
  | "SCHEMA_ERROR"
  | "QUERY_ERROR"
  | "INVALID_STATE"
  | "INVALID_CONFIG";

/**
 * Fatal errors only. Per-record problems are values (see RecordOutcome),
 * never thrown.
 */
export class OrderLoadError extends Error {
  readonly code: OrderLoadErrorCode;
  readonly details?: unknown;

  constructor(code: OrderLoadErrorCode, message: string, options: { details?: unknown; cause?: unknown } = {}) {
    super(`${code}: ${message}`, { cause: options.cause });
    this.name = "OrderLoadError";
    this.code = code;
    this.details = options.details;
  }
}

export function isOrderLoadError(e: unknown, code?: OrderLoadErrorCode): e is OrderLoadError {
  return e instanceof OrderLoadError && (code === undefined || e.code === code);
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function notFound(path: string, cause?: unknown): OrderLoadError {
  return new OrderLoadError("NOT_FOUND", `file not found: ${path}`, { details: { path }, cause });
}

export function parseError(path: string, message: string, cause?: unknown): OrderLoadError {
  return new OrderLoadError("PARSE_ERROR", `${path}: ${message}`, { details: { path }, cause });
}

export function readError(path: string, cause: unknown): OrderLoadError {
  return new OrderLoadError("READ_ERROR", `cannot read ${path}: ${errorMessage(cause)}`, { details: { path }, cause });
}

export function connectionError(filename: string, cause: unknown): OrderLoadError {
  return new OrderLoadError("CONNECTION_ERROR", `cannot open ${filename}: ${errorMessage(cause)}`, {
    details: { filename },
    cause,
  });
}

export function schemaError(cause: unknown): OrderLoadError {
  return new OrderLoadError("SCHEMA_ERROR", `cannot create orders table: ${errorMessage(cause)}`, { cause });
}

export function queryError(what: string, cause: unknown): OrderLoadError {
  return new OrderLoadError("QUERY_ERROR", `${what}: ${errorMessage(cause)}`, { cause });
}

export function invalidState(op: string, state: string): OrderLoadError {
  return new OrderLoadError("INVALID_STATE", `${op}() not allowed while store is ${state}`, {
    details: { op, state },
  });
}
