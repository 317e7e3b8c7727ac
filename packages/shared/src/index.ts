// @triage/shared — shared types, schemas, configuration, logging, and
// classifier backends
export * from "./types.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./watchlist.js";
export * from "./classifier/index.js";
