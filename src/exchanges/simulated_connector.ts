/**
 * @fileoverview Demo venue producing a random-walk ticker with simulated latency.
 * Lets the scanner run end to end without exchange access.
 */

import type { FeeScheduleFragment, Quote } from "../core/types";
import { baseAsset } from "../rates/calculations";
import { delay } from "../utils/async";
import type { VenueConnector } from "./types";

/** Starting mid price per base asset */
const DEFAULT_BASE_PRICES: Readonly<Record<string, number>> = {
  BTC: 50_000,
  ETH: 3_000,
  SOL: 150,
};

/** Price used for assets missing from the base price table */
const FALLBACK_BASE_PRICE = 100;

/** Half spread around mid: 0.02% */
const DEFAULT_HALF_SPREAD = 0.0002;

/** Per-tick drift bound: ±0.1% */
const DEFAULT_STEP = 0.001;

/** Spread of starting prices between venues: ±0.2% */
const DEFAULT_DISPERSION = 0.002;

export interface SimulatedConnectorOptions {
  basePrices?: Readonly<Record<string, number>>;
  halfSpread?: number;
  step?: number;
  dispersion?: number;
  /** Latency range in milliseconds, inclusive of min */
  latencyMs?: readonly [number, number];
  /** Withdrawal fee per asset reported by fetchTransferFees */
  withdrawalFees?: Readonly<Record<string, number>>;
  /** Uniform [0, 1) source; Math.random by default */
  random?: () => number;
  now?: () => number;
}

/**
 * Random-walk quote source. Each symbol keeps its own last price.
 */
export class SimulatedConnector implements VenueConnector {
  readonly kind = "simulated" as const;
  private readonly lastPrices = new Map<string, number>();
  private readonly basePrices: Readonly<Record<string, number>>;
  private readonly halfSpread: number;
  private readonly step: number;
  private readonly dispersion: number;
  private readonly latencyMs: readonly [number, number];
  private readonly withdrawalFees: Readonly<Record<string, number>>;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    readonly id: string,
    options: SimulatedConnectorOptions = {},
  ) {
    this.basePrices = options.basePrices ?? DEFAULT_BASE_PRICES;
    this.halfSpread = options.halfSpread ?? DEFAULT_HALF_SPREAD;
    this.step = options.step ?? DEFAULT_STEP;
    this.dispersion = options.dispersion ?? DEFAULT_DISPERSION;
    this.latencyMs = options.latencyMs ?? [100, 500];
    this.withdrawalFees = options.withdrawalFees ?? {};
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /** Uniform value in [min, max). */
  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  private nextPrice(symbol: string): number {
    const previous = this.lastPrices.get(symbol);
    const price =
      previous === undefined
        ? (this.basePrices[baseAsset(symbol)] ?? FALLBACK_BASE_PRICE) * this.uniform(1 - this.dispersion, 1 + this.dispersion)
        : previous * this.uniform(1 - this.step, 1 + this.step);
    this.lastPrices.set(symbol, price);
    return price;
  }

  async fetchTicker(symbol: string, signal?: AbortSignal): Promise<Quote> {
    const [minLatency, maxLatency] = this.latencyMs;
    await delay(this.uniform(minLatency, maxLatency), signal);
    const mid = this.nextPrice(symbol);
    return {
      venueId: this.id,
      symbol,
      bid: mid * (1 - this.halfSpread),
      ask: mid * (1 + this.halfSpread),
      observedAt: this.now(),
    };
  }

  async fetchTransferFees(asset: string): Promise<FeeScheduleFragment> {
    const code = asset.toUpperCase();
    return { venueId: this.id, asset: code, withdrawalFee: this.withdrawalFees[code] ?? null };
  }
}
