/**
 * Core module exports for flyweight-kit.
 */

export * from "./config.ts";
export * from "./logger.ts";

// Registry module - KeyedStore and alias-aware lookup tables
export * from "./registry/index.ts";

// Flyweight module - shared-instance factories
export * from "./flyweight/index.ts";
