/**
 * THORChain pool prices and outbound fees.
 * Midgard: https://midgard.ninerealms.com/v2/doc
 * THORNode inbound addresses: https://thornode.ninerealms.com/thorchain/inbound_addresses
 */

import { z } from "zod";
import { THORCHAIN_AMOUNT_SCALE, THORCHAIN_MIDGARD_API, THORNODE_API } from "../core/constants";
import { MarketDataError } from "../core/errors";
import type { FeeScheduleFragment, Quote } from "../core/types";
import { baseAsset } from "../rates/calculations";
import { fetchJson } from "../utils/http";
import type { VenueConnector } from "./types";

/** Native pool for each base asset, as CHAIN.ASSET */
const POOL_ASSETS: Readonly<Record<string, string>> = {
  BTC: "BTC.BTC",
  ETH: "ETH.ETH",
  BCH: "BCH.BCH",
  LTC: "LTC.LTC",
  DOGE: "DOGE.DOGE",
  AVAX: "AVAX.AVAX",
  BNB: "BSC.BNB",
  ATOM: "GAIA.ATOM",
};

const poolSchema = z
  .object({
    asset: z.string(),
    assetPriceUSD: z.string(),
  })
  .passthrough();

const inboundSchema = z.array(
  z
    .object({
      chain: z.string(),
      outbound_fee: z.string().optional(),
    })
    .passthrough(),
);

/**
 * Maps a base asset to its THORChain pool, or null when there is none.
 */
export function poolAssetFor(asset: string): string | null {
  return POOL_ASSETS[asset.toUpperCase()] ?? null;
}

export interface BridgeConnectorOptions {
  timeoutMs?: number;
  now?: () => number;
}

/**
 * Quotes the pool's USD price as both bid and ask; the outbound fee of the
 * pool's chain is the withdrawal fee.
 */
export class BridgeConnector implements VenueConnector {
  readonly kind = "bridge" as const;
  private readonly timeoutMs: number | undefined;
  private readonly now: () => number;

  constructor(
    readonly id: string,
    options: BridgeConnectorOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? Date.now;
  }

  async fetchTicker(symbol: string, signal?: AbortSignal): Promise<Quote> {
    const pool = poolAssetFor(baseAsset(symbol));
    if (!pool) throw new MarketDataError(symbol, "No THORChain pool for base asset");

    const payload = await fetchJson<unknown>(`${THORCHAIN_MIDGARD_API}/pool/${pool}`, {
      timeoutMs: this.timeoutMs,
      signal,
    });
    const parsed = poolSchema.safeParse(payload);
    if (!parsed.success) throw new MarketDataError(symbol, `Unexpected Midgard payload: ${parsed.error.message}`);

    const price = Number(parsed.data.assetPriceUSD);
    if (!Number.isFinite(price) || price <= 0) {
      throw new MarketDataError(symbol, `Invalid pool price '${parsed.data.assetPriceUSD}'`);
    }
    return { venueId: this.id, symbol, bid: price, ask: price, observedAt: this.now() };
  }

  async fetchTransferFees(asset: string, signal?: AbortSignal): Promise<FeeScheduleFragment> {
    const code = asset.toUpperCase();
    const pool = poolAssetFor(code);
    if (!pool) return { venueId: this.id, asset: code, withdrawalFee: null };

    const payload = await fetchJson<unknown>(`${THORNODE_API}/inbound_addresses`, {
      timeoutMs: this.timeoutMs,
      signal,
    });
    const parsed = inboundSchema.safeParse(payload);
    if (!parsed.success) throw new MarketDataError(code, `Unexpected inbound_addresses payload: ${parsed.error.message}`);

    const [chain = ""] = pool.split(".");
    const inbound = parsed.data.find((entry) => entry.chain.toUpperCase() === chain);
    const raw = inbound?.outbound_fee !== undefined ? Number(inbound.outbound_fee) : NaN;
    const withdrawalFee = Number.isFinite(raw) && raw >= 0 ? raw / THORCHAIN_AMOUNT_SCALE : null;
    return { venueId: this.id, asset: code, withdrawalFee };
  }
}
