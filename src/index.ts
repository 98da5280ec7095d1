/**
 * @fileoverview Main entry point for scanner library exports.
 * Re-exports all public APIs from submodules.
 */

// Core types, errors, and constants
export * from "./core";

// Venue connectors
export * from "./exchanges";

// Fee model and price arithmetic
export * from "./rates/calculations";
export * from "./rates/fees";

// Quote collection, scanning, orchestration
export * from "./market/quotes";
export * from "./scanner";
export * from "./orchestrator";
export * from "./format";

// Settings
export * from "./config/settings";

// Async and HTTP utilities
export * from "./utils/async";
export * from "./utils/http";
