/**
 * @fileoverview Plain-text rendering of scan results for the terminal.
 */

import type { FetchFailure, Opportunity } from "./core/types";
import type { ScanCycleResult } from "./orchestrator";

function formatPrice(price: number): string {
  if (price >= 1000) return price.toFixed(2);
  if (price >= 1) return price.toFixed(4);
  return price.toPrecision(6);
}

function formatSigned(value: number, digits: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(digits)}`;
}

/**
 * One line per opportunity, ranked as given.
 *
 * @example
 * ```
 *  1 ) BTC/USDT   +0.4123% | okx -> binance | buy=50010.00 sell=50270.00 | net=+206.1800
 * ```
 */
export function formatOpportunityLine(opp: Opportunity, index: number): string {
  return (
    `${String(index + 1).padStart(2, " ")} ) ${opp.symbol.padEnd(10)} ${formatSigned(opp.profitPct, 4)}% | ` +
    `${opp.buyVenue} -> ${opp.sellVenue} | buy=${formatPrice(opp.buyPrice)} sell=${formatPrice(opp.sellPrice)} | ` +
    `net=${formatSigned(opp.netProfit, 4)} fees=${opp.totalFees.toFixed(4)}`
  );
}

export function formatFailureLine(failure: FetchFailure): string {
  return `- ${failure.venueId.padEnd(12)} ${failure.symbol.padEnd(10)} ${failure.operation}: ${failure.error.message}`;
}

/**
 * Renders a whole scan cycle: header, ranked opportunities, then failures.
 *
 * @param limit - Maximum opportunities to list; 0 lists all
 */
export function formatScanReport(result: ScanCycleResult, opportunities: readonly Opportunity[], limit = 0): string {
  const shown = limit > 0 ? opportunities.slice(0, limit) : opportunities;
  const lines: string[] = [];
  lines.push("=".repeat(60));
  lines.push(
    `SCAN ${new Date(result.finishedAt).toISOString()} | quotes=${result.quoteCount} ` +
      `opportunities=${opportunities.length} failures=${result.failures.length} ` +
      `(${result.finishedAt - result.startedAt}ms)`,
  );
  lines.push("=".repeat(60));

  if (shown.length === 0) {
    lines.push("(no opportunities above threshold)");
  } else {
    shown.forEach((opp, idx) => lines.push(formatOpportunityLine(opp, idx)));
    if (shown.length < opportunities.length) {
      lines.push(`... ${opportunities.length - shown.length} more`);
    }
  }

  if (result.failures.length > 0) {
    lines.push("");
    lines.push("Failures:");
    for (const failure of result.failures) lines.push(formatFailureLine(failure));
  }
  return lines.join("\n");
}
