/**
 * @fileoverview Venue connector exports.
 */

export * from "./types";
export * from "./cex_connector";
export * from "./dex_connector";
export * from "./bridge_connector";
export * from "./simulated_connector";
export * from "./connectors";
