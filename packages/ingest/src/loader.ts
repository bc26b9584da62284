import * as fs from "node:fs";

import type { RawOrderRecord } from "../../schema/src/index.js";
import { notFound, parseError, readError } from "./errors.js";
import type { Logger } from "./logger.js";

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Read a JSON array of order records. Order is preserved; elements are
 * left untyped for the store to classify.
 *
 * Throws NOT_FOUND, READ_ERROR or PARSE_ERROR; nothing is returned on failure.
 */
export function loadOrders(filePath: string, logger: Logger): RawOrderRecord[] {
  const log = logger.child({ component: "loader" });

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (e) {
    const err = isErrnoException(e) && e.code === "ENOENT" ? notFound(filePath, e) : readError(filePath, e);
    log.error({ path: filePath, code: err.code }, err.message);
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    const err = parseError(filePath, e instanceof Error ? e.message : "invalid JSON", e);
    log.error({ path: filePath, head: raw.slice(0, 120) }, err.message);
    throw err;
  }

  if (!Array.isArray(data)) {
    const err = parseError(filePath, `expected a JSON array, got ${data === null ? "null" : typeof data}`);
    log.error({ path: filePath }, err.message);
    throw err;
  }

  const records: RawOrderRecord[] = data;
  log.info({ path: filePath, count: records.length }, `read ${filePath}, records: ${records.length}`);
  return records;
}
