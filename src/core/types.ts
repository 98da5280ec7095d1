/**
 * @fileoverview Core type definitions for the arbitrage scanner.
 * Uses interfaces for object shapes and type aliases for unions.
 */

// =============================================================================
// Union Types
// =============================================================================

/**
 * Kind of trading venue behind a connector.
 * - cex: centralized exchange (ccxt)
 * - dex: on-chain pool quoted through an aggregator API
 * - bridge: cross-chain liquidity pool
 * - simulated: demo venue with a random-walk price
 */
export type VenueKind = "cex" | "dex" | "bridge" | "simulated";

/** Collaborator call that produced a failure. */
export type FetchOperation = "ticker" | "transferFees";

// =============================================================================
// Market Data Interfaces
// =============================================================================

/**
 * Best bid/ask observed on one venue for one symbol.
 * A side the venue did not report is null.
 */
export interface Quote {
  /** Venue identifier (e.g., "binance") */
  readonly venueId: string;
  /** Trading pair (e.g., "BTC/USDT") */
  readonly symbol: string;
  /** Highest bid price */
  readonly bid: number | null;
  /** Lowest ask price */
  readonly ask: number | null;
  /** Observation time in epoch milliseconds */
  readonly observedAt: number;
}

/**
 * Quote with both sides present, positive and not inverted.
 */
export interface ValidQuote extends Quote {
  readonly bid: number;
  readonly ask: number;
}

// =============================================================================
// Fee Interfaces
// =============================================================================

/**
 * Fee schedule applied to a venue during one scan.
 */
export interface FeeSchedule {
  /** Venue the schedule was resolved for */
  readonly venueId: string;
  /** Taker fee as a decimal (0.001 = 0.1%) */
  readonly takerRate: number;
  /** Fixed withdrawal fee per asset, in units of that asset */
  readonly withdrawalFees: Readonly<Record<string, number>>;
}

/**
 * Partial fee data reported live by a venue for one asset.
 */
export interface FeeScheduleFragment {
  readonly venueId: string;
  /** Asset code (e.g., "BTC") */
  readonly asset: string;
  /** Fixed withdrawal fee in asset units, null if the venue did not report one */
  readonly withdrawalFee: number | null;
  /** Taker rate, when the venue reports it alongside transfer fees */
  readonly takerRate?: number;
}

// =============================================================================
// Opportunity Interfaces
// =============================================================================

/**
 * Economics of buying on one venue and selling on another, per unit of base asset.
 * All money fields are in quote currency unless stated otherwise.
 */
export interface VenuePairResult {
  /** Ask on the buy venue */
  readonly buyPrice: number;
  /** Bid on the sell venue */
  readonly sellPrice: number;
  /** Taker fee paid on the buy leg */
  readonly buyFee: number;
  /** Taker fee paid on the sell leg */
  readonly sellFee: number;
  /** Withdrawal fee from the buy venue, in base asset units */
  readonly withdrawalFeeInAsset: number;
  /** Withdrawal fee converted at the buy price */
  readonly withdrawalFee: number;
  /** buyPrice + buyFee */
  readonly totalCost: number;
  /** sellPrice - sellFee */
  readonly netRevenue: number;
  /** sellPrice - buyPrice */
  readonly grossProfit: number;
  /** buyFee + sellFee + withdrawalFee */
  readonly totalFees: number;
  /** netRevenue - totalCost - withdrawalFee */
  readonly netProfit: number;
  /** netProfit / totalCost * 100 */
  readonly profitPct: number;
}

/**
 * A venue pair that cleared the profit threshold.
 */
export interface Opportunity extends VenuePairResult {
  readonly symbol: string;
  /** Venue to buy on (ask side) */
  readonly buyVenue: string;
  /** Venue to sell on (bid side) */
  readonly sellVenue: string;
}

/**
 * A fetch that failed or was abandoned during aggregation.
 */
export interface FetchFailure {
  readonly venueId: string;
  /** Symbol for ticker fetches, asset code for transfer fee fetches */
  readonly symbol: string;
  readonly operation: FetchOperation;
  readonly error: Error;
}

/**
 * Quotes collected in one aggregation cycle, treated as simultaneous.
 */
export interface QuoteCollection {
  readonly quotes: readonly Quote[];
  readonly failures: readonly FetchFailure[];
}

// =============================================================================
// Type Guards
// =============================================================================

function isPositivePrice(value: number | null): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

/**
 * Checks that a quote can take part in a scan: both sides present,
 * positive, and bid not above ask.
 *
 * @param quote - The quote to validate
 * @returns True if the quote is usable
 */
export function isValidQuote(quote: Quote): quote is ValidQuote {
  return isPositivePrice(quote.bid) && isPositivePrice(quote.ask) && quote.bid <= quote.ask;
}

function isFeeAmount(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Checks that a transfer fee fragment carries only finite, non-negative
 * amounts. A null withdrawal fee and an absent taker rate are allowed.
 */
export function isUsableFragment(fragment: FeeScheduleFragment): boolean {
  return (
    (fragment.withdrawalFee === null || isFeeAmount(fragment.withdrawalFee)) &&
    (fragment.takerRate === undefined || isFeeAmount(fragment.takerRate))
  );
}

/**
 * Checks if a value is a known VenueKind.
 */
export function isVenueKind(value: unknown): value is VenueKind {
  return value === "cex" || value === "dex" || value === "bridge" || value === "simulated";
}

/**
 * Runtime array check that does not narrow the declared type.
 */
export function isList(value: unknown): boolean {
  return Array.isArray(value);
}
