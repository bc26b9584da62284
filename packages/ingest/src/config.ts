import { z } from "zod";

import { OrderLoadError } from "./errors.js";

export const DEFAULT_INPUT = "orders-1.json";
export const DEFAULT_DB = "orders.db";
export const DEFAULT_LOG_FILE = "orders_loader.log";

const LoaderConfigSchema = z.object({
  input: z.string().min(1),
  db: z.string().min(1),
  log_file: z.string().min(1),
});

export type LoaderConfig = z.infer<typeof LoaderConfigSchema>;

export type Env = Record<string, string | undefined>;

export function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

const VALUE_FLAGS = ["--db", "--log-file"];

/** First argument that is neither a flag nor a flag's value. */
function positional(args: string[]): string | null {
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (VALUE_FLAGS.includes(a)) {
      i++;
      continue;
    }
    if (!a.startsWith("-")) return a;
  }
  return null;
}

function nonEmpty(v: string | undefined): string | null {
  return v !== undefined && v.trim() !== "" ? v : null;
}

/**
 * Precedence: flag > environment > default.
 *
 *   ORDER_LOADER_INPUT, ORDER_LOADER_DB, ORDER_LOADER_LOG_FILE
 */
export function resolveLoaderConfig(args: string[], env: Env = process.env): LoaderConfig {
  for (const flag of VALUE_FLAGS) {
    if (args.includes(flag) && getFlagValue(args, flag) === null) {
      throw new OrderLoadError("INVALID_CONFIG", `missing value for ${flag}`);
    }
  }

  const candidate = {
    input: positional(args) ?? nonEmpty(env.ORDER_LOADER_INPUT) ?? DEFAULT_INPUT,
    db: getFlagValue(args, "--db") ?? nonEmpty(env.ORDER_LOADER_DB) ?? DEFAULT_DB,
    log_file: getFlagValue(args, "--log-file") ?? nonEmpty(env.ORDER_LOADER_LOG_FILE) ?? DEFAULT_LOG_FILE,
  };

  const parsed = LoaderConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new OrderLoadError("INVALID_CONFIG", parsed.error.message, { details: parsed.error.issues });
  }
  return parsed.data;
}
