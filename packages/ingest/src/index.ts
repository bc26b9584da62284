export * from "./config.js";
export * from "./errors.js";
export * from "./loader.js";
export * from "./logger.js";
export * from "./order-store.js";
export * from "./outcomes.js";
export * from "./run.js";
export * from "./sqlite-order-store.js";
