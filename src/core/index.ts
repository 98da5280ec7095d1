/**
 * @fileoverview Core module exports.
 * Re-exports all core types, errors, and constants.
 */

export * from "./types";
export * from "./errors";
export * from "./constants";
