/**
 * Pool prices from DexScreener for on-chain venues not covered by CCXT.
 * Docs: https://docs.dexscreener.com/api/reference
 */

import { z } from "zod";
import { DEFAULT_DEX_CHAIN_ID, DEFAULT_DEX_ID, DEXSCREENER_API } from "../core/constants";
import { MarketDataError } from "../core/errors";
import type { FeeScheduleFragment, Quote } from "../core/types";
import { baseAsset, quoteAsset } from "../rates/calculations";
import { fetchJson } from "../utils/http";
import type { VenueConnector } from "./types";

// Pools quote wrapped tokens; these count as the same asset.
const TOKEN_ALIASES: Readonly<Record<string, readonly string[]>> = {
  ETH: ["ETH", "WETH"],
  BTC: ["BTC", "WBTC"],
  MATIC: ["MATIC", "WMATIC", "POL"],
  BNB: ["BNB", "WBNB"],
  AVAX: ["AVAX", "WAVAX"],
};

const pairSchema = z
  .object({
    chainId: z.string(),
    dexId: z.string(),
    baseToken: z.object({ symbol: z.string() }).passthrough(),
    quoteToken: z.object({ symbol: z.string() }).passthrough(),
    priceNative: z.string(),
    liquidity: z.object({ usd: z.number().optional() }).passthrough().optional(),
  })
  .passthrough();

const searchSchema = z.object({ pairs: z.array(pairSchema).nullable().optional() }).passthrough();

type DexPair = z.infer<typeof pairSchema>;

function aliasesOf(token: string): readonly string[] {
  return Object.values(TOKEN_ALIASES).find((group) => group.includes(token)) ?? [token];
}

export interface DexConnectorOptions {
  /** DexScreener chain filter (e.g., "ethereum") */
  chainId?: string;
  /** DexScreener dex filter (e.g., "uniswap") */
  dexId?: string;
  timeoutMs?: number;
  now?: () => number;
}

/**
 * Quotes the deepest matching pool as both bid and ask.
 * Withdrawal fees are not reported: the pool is the venue and gas is not modeled.
 */
export class DexConnector implements VenueConnector {
  readonly kind = "dex" as const;
  private readonly chainId: string;
  private readonly dexId: string;
  private readonly timeoutMs: number | undefined;
  private readonly now: () => number;

  constructor(
    readonly id: string,
    options: DexConnectorOptions = {},
  ) {
    this.chainId = (options.chainId ?? DEFAULT_DEX_CHAIN_ID).toLowerCase();
    this.dexId = (options.dexId ?? DEFAULT_DEX_ID).toLowerCase();
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? Date.now;
  }

  private matches(pair: DexPair, base: string, quote: string | null): boolean {
    if (pair.chainId.toLowerCase() !== this.chainId) return false;
    if (pair.dexId.toLowerCase() !== this.dexId) return false;
    if (!aliasesOf(base).includes(pair.baseToken.symbol.toUpperCase())) return false;
    return quote === null || aliasesOf(quote).includes(pair.quoteToken.symbol.toUpperCase());
  }

  async fetchTicker(symbol: string, signal?: AbortSignal): Promise<Quote> {
    const base = baseAsset(symbol);
    const quote = quoteAsset(symbol);
    const query = encodeURIComponent([aliasesOf(base).at(-1) ?? base, quote ?? ""].join(" ").trim());
    const payload = await fetchJson<unknown>(`${DEXSCREENER_API}/search?q=${query}`, {
      timeoutMs: this.timeoutMs,
      signal,
    });

    const parsed = searchSchema.safeParse(payload);
    if (!parsed.success) throw new MarketDataError(symbol, `Unexpected DexScreener payload: ${parsed.error.message}`);

    const best = (parsed.data.pairs ?? [])
      .filter((pair) => this.matches(pair, base, quote))
      .sort((a, b) => (b.liquidity?.usd ?? 0) - (a.liquidity?.usd ?? 0))[0];
    if (!best) throw new MarketDataError(symbol, `No ${this.dexId} pool on ${this.chainId}`);

    const price = Number(best.priceNative);
    if (!Number.isFinite(price) || price <= 0) throw new MarketDataError(symbol, `Invalid pool price '${best.priceNative}'`);
    return { venueId: this.id, symbol, bid: price, ask: price, observedAt: this.now() };
  }

  async fetchTransferFees(asset: string): Promise<FeeScheduleFragment> {
    return { venueId: this.id, asset: asset.toUpperCase(), withdrawalFee: null };
  }
}
