/**
 * Common utilities shared across modules
 */

export * from "./logger.ts";
export * from "./response.ts";
