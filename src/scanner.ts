/**
 * @fileoverview Fee-adjusted cross-venue arbitrage detection.
 * Pure and synchronous: no I/O, no shared state.
 */

import { InvalidInputError } from "./core/errors";
import { isList, isValidQuote, type Opportunity, type Quote, type ValidQuote, type VenuePairResult } from "./core/types";
import { applyFee, baseAsset, profitPct, roundTo, takerFee } from "./rates/calculations";
import type { FeeModel } from "./rates/fees";

/** Fee lookups the scanner needs; satisfied by {@link FeeModel}. */
export type FeeLookup = Pick<FeeModel, "resolve" | "withdrawalFee">;

/**
 * Groups valid quotes by symbol, one quote per venue.
 * Invalid quotes and non-object entries are dropped. Venue ids compare
 * case-insensitively, as fee lookups do; when a venue reports a symbol twice
 * the later observation wins.
 */
export function groupValidQuotes(quotes: Iterable<Quote>): Map<string, ValidQuote[]> {
  const bySymbol = new Map<string, Map<string, ValidQuote>>();
  for (const quote of quotes) {
    // Runtime input may hold holes the declared type does not admit
    if (typeof quote !== "object" || quote === null || !isValidQuote(quote)) continue;
    let byVenue = bySymbol.get(quote.symbol);
    if (!byVenue) {
      byVenue = new Map();
      bySymbol.set(quote.symbol, byVenue);
    }
    const venueKey = quote.venueId.trim().toLowerCase();
    const existing = byVenue.get(venueKey);
    if (!existing || quote.observedAt >= existing.observedAt) byVenue.set(venueKey, quote);
  }

  const out = new Map<string, ValidQuote[]>();
  for (const [symbol, byVenue] of bySymbol) out.set(symbol, [...byVenue.values()]);
  return out;
}

/**
 * All ordered pairs of distinct items: n·(n−1) pairs, both directions.
 */
export function directionalPairs<T>(items: readonly T[]): Array<[T, T]> {
  const pairs: Array<[T, T]> = [];
  items.forEach((first, i) => {
    items.forEach((second, j) => {
      if (i !== j) pairs.push([first, second]);
    });
  });
  return pairs;
}

/**
 * Economics of buying `symbol` at `buy.ask` and selling at `sell.bid`.
 * Values are unrounded.
 *
 * @returns The pair result, or null when the ask is not below the bid
 *
 * @example
 * ```typescript
 * // ask 100 @ 0.1% taker, bid 102 @ 0.2% taker
 * evaluatePair("X/USDT", a, b, fees)?.netProfit; // ≈ 1.696
 * ```
 */
export function evaluatePair(
  symbol: string,
  buy: ValidQuote,
  sell: ValidQuote,
  fees: FeeLookup,
): VenuePairResult | null {
  const buyPrice = buy.ask;
  const sellPrice = sell.bid;
  if (buyPrice >= sellPrice) return null;

  const buySchedule = fees.resolve(buy.venueId);
  const sellSchedule = fees.resolve(sell.venueId);

  const buyFee = takerFee(buyPrice, buySchedule.takerRate);
  const totalCost = applyFee(buyPrice, buySchedule.takerRate, "buy");
  const sellFee = takerFee(sellPrice, sellSchedule.takerRate);
  const netRevenue = applyFee(sellPrice, sellSchedule.takerRate, "sell");

  // Withdrawn from the buy venue, so its fee applies, valued at the buy price.
  const withdrawalFeeInAsset = fees.withdrawalFee(buySchedule, baseAsset(symbol));
  const withdrawalFee = withdrawalFeeInAsset * buyPrice;

  const netProfit = netRevenue - totalCost - withdrawalFee;
  return {
    buyPrice,
    sellPrice,
    buyFee,
    sellFee,
    withdrawalFeeInAsset,
    withdrawalFee,
    totalCost,
    netRevenue,
    grossProfit: sellPrice - buyPrice,
    totalFees: buyFee + sellFee + withdrawalFee,
    netProfit,
    profitPct: profitPct(netProfit, totalCost),
  };
}

function roundResult(result: VenuePairResult): VenuePairResult {
  return {
    buyPrice: roundTo(result.buyPrice),
    sellPrice: roundTo(result.sellPrice),
    buyFee: roundTo(result.buyFee),
    sellFee: roundTo(result.sellFee),
    withdrawalFeeInAsset: roundTo(result.withdrawalFeeInAsset),
    withdrawalFee: roundTo(result.withdrawalFee),
    totalCost: roundTo(result.totalCost),
    netRevenue: roundTo(result.netRevenue),
    grossProfit: roundTo(result.grossProfit),
    totalFees: roundTo(result.totalFees),
    netProfit: roundTo(result.netProfit),
    profitPct: roundTo(result.profitPct),
  };
}

/**
 * Finds every directional venue pair whose fee-adjusted profit percentage is
 * strictly above `thresholdPct`.
 *
 * Symbols with fewer than two valid quotes are skipped. Both (A, B) and
 * (B, A) are evaluated. Emitted values are rounded to display precision;
 * filtering uses full precision. Output is grouped by symbol, otherwise
 * unordered; see {@link rankOpportunities}.
 *
 * @param quotes - Quote snapshot
 * @param fees - Fee model for schedule and withdrawal lookups
 * @param thresholdPct - Minimum profit percentage, exclusive
 * @throws {InvalidInputError} Only for structurally invalid arguments
 */
export function scanOpportunities(quotes: readonly Quote[], fees: FeeLookup, thresholdPct: number): Opportunity[] {
  if (!isList(quotes)) throw new InvalidInputError("quotes", "expected an array of quotes");
  if (typeof fees?.resolve !== "function" || typeof fees.withdrawalFee !== "function") {
    throw new InvalidInputError("fees", "expected a fee model");
  }
  if (typeof thresholdPct !== "number" || !Number.isFinite(thresholdPct)) {
    throw new InvalidInputError("thresholdPct", `expected a finite number, got ${thresholdPct}`);
  }

  const opportunities: Opportunity[] = [];
  for (const [symbol, venueQuotes] of groupValidQuotes(quotes)) {
    if (venueQuotes.length < 2) continue;
    for (const [buy, sell] of directionalPairs(venueQuotes)) {
      const result = evaluatePair(symbol, buy, sell, fees);
      if (!result || result.netProfit <= 0) continue;
      if (result.profitPct <= thresholdPct) continue;
      opportunities.push({ symbol, buyVenue: buy.venueId, sellVenue: sell.venueId, ...roundResult(result) });
    }
  }
  return opportunities;
}

/**
 * Sorts a copy for display: best profit percentage first.
 */
export function rankOpportunities(opportunities: readonly Opportunity[]): Opportunity[] {
  return [...opportunities].sort(
    (a, b) =>
      b.profitPct - a.profitPct ||
      b.netProfit - a.netProfit ||
      a.symbol.localeCompare(b.symbol) ||
      a.buyVenue.localeCompare(b.buyVenue) ||
      a.sellVenue.localeCompare(b.sellVenue),
  );
}
