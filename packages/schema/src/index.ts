export * from "./schema.js";
export * from "./timestamp.js";
export * from "./validate.js";
