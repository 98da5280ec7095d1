/**
 * @fileoverview Price calculation utilities for arbitrage analysis.
 */

import { DISPLAY_PRECISION } from "../core/constants";

/** Side of a trade for fee application */
export type TradeSide = "buy" | "sell";

/**
 * Calculates the taker fee charged on a notional amount.
 *
 * @param notional - Trade value in quote currency
 * @param feeRate - The fee rate as a decimal (e.g., 0.001 for 0.1%)
 * @returns The fee in quote currency
 * @throws {Error} If feeRate is negative
 *
 * @example
 * ```typescript
 * takerFee(100, 0.001); // Returns 0.1
 * ```
 */
export function takerFee(notional: number, feeRate: number): number {
  if (feeRate < 0) {
    throw new Error("feeRate must be >= 0");
  }
  return notional * feeRate;
}

/**
 * Applies a fee rate to a price based on trade side.
 *
 * - Buy side: price increases by the fee (you pay more)
 * - Sell side: price decreases by the fee (you receive less)
 *
 * @param price - The original price
 * @param feeRate - The fee rate as a decimal
 * @param side - The trade side ("buy" or "sell")
 * @returns The fee-adjusted price
 * @throws {Error} If price is not positive or feeRate is negative
 *
 * @example
 * ```typescript
 * applyFee(100, 0.001, "buy");  // Returns 100.1
 * applyFee(102, 0.002, "sell"); // Returns 101.796
 * ```
 */
export function applyFee(price: number, feeRate: number, side: TradeSide): number {
  if (price <= 0) {
    throw new Error("price must be > 0");
  }

  const fee = takerFee(price, feeRate);
  if (side === "buy") {
    return price + fee;
  }
  if (side === "sell") {
    return price - fee;
  }

  // Exhaustive check - TypeScript will error if new side is added
  const exhaustiveCheck: never = side;
  throw new Error(`Unknown trade side: ${exhaustiveCheck}`);
}

/**
 * Net profit as a percentage of acquisition cost.
 *
 * @param netProfit - Profit after all fees, in quote currency
 * @param totalCost - Buy price plus buy fee
 * @returns The profit percentage
 * @throws {Error} If totalCost is not positive
 */
export function profitPct(netProfit: number, totalCost: number): number {
  if (totalCost <= 0) {
    throw new Error("totalCost must be > 0");
  }
  return (netProfit / totalCost) * 100.0;
}

/**
 * Rounds a value for display. Comparisons must use the unrounded value.
 *
 * @param value - Value to round
 * @param digits - Decimal places, defaults to DISPLAY_PRECISION
 */
export function roundTo(value: number, digits: number = DISPLAY_PRECISION): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Extracts the base asset from a trading pair.
 *
 * @example
 * ```typescript
 * baseAsset("BTC/USDT"); // "BTC"
 * baseAsset("WETH");     // "WETH"
 * ```
 */
export function baseAsset(symbol: string): string {
  const [base = symbol] = symbol.split("/");
  return base.trim().toUpperCase();
}

/**
 * Extracts the quote asset from a trading pair, or null when there is none.
 */
export function quoteAsset(symbol: string): string | null {
  const parts = symbol.split("/");
  const quote = parts[1]?.trim();
  return quote ? quote.toUpperCase() : null;
}
