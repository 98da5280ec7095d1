/**
 * @fileoverview Builds venue connectors from `kind:id` venue entries.
 * The connector variant is fixed at construction time.
 */

import { ConfigurationError } from "../core/errors";
import { isVenueKind } from "../core/types";
import { BridgeConnector } from "./bridge_connector";
import { createCexConnector } from "./cex_connector";
import { DexConnector } from "./dex_connector";
import { SimulatedConnector, type SimulatedConnectorOptions } from "./simulated_connector";
import type { VenueConnector, VenueSpec } from "./types";

/**
 * Parses a venue entry. A bare id means a centralized exchange.
 *
 * @example
 * ```typescript
 * parseVenueSpec("okx");           // { kind: "cex", id: "okx" }
 * parseVenueSpec("dex:uniswap");   // { kind: "dex", id: "uniswap" }
 * ```
 * @throws {ConfigurationError} When the kind is unknown or the id is empty
 */
export function parseVenueSpec(entry: string): VenueSpec {
  const trimmed = entry.trim();
  const separator = trimmed.indexOf(":");
  const kind = separator >= 0 ? trimmed.slice(0, separator).trim().toLowerCase() : "cex";
  const id = (separator >= 0 ? trimmed.slice(separator + 1) : trimmed).trim().toLowerCase();

  if (!isVenueKind(kind)) {
    throw new ConfigurationError("SCAN_VENUES", `Unknown venue kind '${kind}' in '${entry}'`);
  }
  if (!id) {
    throw new ConfigurationError("SCAN_VENUES", `Missing venue id in '${entry}'`);
  }
  return { kind, id };
}

export interface ConnectorOptions {
  /** Replace cex venues with simulated ones; dex and bridge venues are skipped */
  demoMode?: boolean;
  /** Timeout for connector requests */
  timeoutMs?: number;
  dexChainId?: string;
  dexId?: string;
  env?: NodeJS.ProcessEnv;
  simulated?: SimulatedConnectorOptions;
}

/**
 * Creates the connector for one venue.
 */
export function createConnector(spec: VenueSpec, options: ConnectorOptions = {}): VenueConnector {
  switch (spec.kind) {
    case "cex":
      return createCexConnector(spec.id, { timeout: options.timeoutMs, env: options.env });
    case "dex":
      return new DexConnector(spec.id, { chainId: options.dexChainId, dexId: options.dexId, timeoutMs: options.timeoutMs });
    case "bridge":
      return new BridgeConnector(spec.id, { timeoutMs: options.timeoutMs });
    case "simulated":
      return new SimulatedConnector(spec.id, options.simulated);
    default: {
      const exhaustiveCheck: never = spec.kind;
      throw new ConfigurationError("SCAN_VENUES", `Unknown venue kind: ${exhaustiveCheck}`);
    }
  }
}

/**
 * Creates connectors for a venue list. In demo mode centralized exchanges are
 * simulated under the same id, and on-chain venues are left out.
 */
export function createConnectors(specs: readonly VenueSpec[], options: ConnectorOptions = {}): VenueConnector[] {
  const connectors: VenueConnector[] = [];
  for (const spec of specs) {
    if (options.demoMode) {
      if (spec.kind === "dex" || spec.kind === "bridge") continue;
      connectors.push(createConnector({ kind: "simulated", id: spec.id }, options));
      continue;
    }
    connectors.push(createConnector(spec, options));
  }
  return connectors;
}
