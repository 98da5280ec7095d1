/**
 * @fileoverview Venue connector contract shared by every venue kind.
 */

import type { FeeScheduleFragment, Quote, VenueKind } from "../core/types";

/**
 * Market data source for one venue. Must be safe to call concurrently for
 * distinct symbols. Failures are reported by rejecting.
 */
export interface VenueConnector {
  readonly kind: VenueKind;
  /** Venue identifier used for fee lookup and reporting */
  readonly id: string;

  /** Best bid/ask for a symbol such as "BTC/USDT". */
  fetchTicker(symbol: string, signal?: AbortSignal): Promise<Quote>;

  /** Withdrawal fee (and optionally taker rate) for an asset such as "BTC". */
  fetchTransferFees(asset: string, signal?: AbortSignal): Promise<FeeScheduleFragment>;
}

/**
 * Parsed `kind:id` venue entry from configuration.
 */
export interface VenueSpec {
  readonly kind: VenueKind;
  readonly id: string;
}
