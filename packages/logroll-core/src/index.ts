export * from "./logger/index.js";
export * from "./health/index.js";
