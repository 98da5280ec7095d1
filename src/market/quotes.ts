/**
 * @fileoverview Best-effort quote snapshot across venues.
 * One fetch per (venue, symbol), fanned out concurrently and joined once;
 * individual failures are recorded, never thrown.
 */

import { FetchCancelledError, InvalidInputError, toError } from "../core/errors";
import { isList, type FetchFailure, type Quote, type QuoteCollection } from "../core/types";
import type { VenueConnector } from "../exchanges/types";
import { fanOut, type FanOutOptions } from "../utils/async";

/**
 * Options for {@link collectQuotes}: caller cancellation, a deadline for the
 * whole collection, and the number of fetches in flight.
 */
export type CollectOptions = FanOutOptions;

interface FetchTask {
  readonly venue: VenueConnector;
  readonly symbol: string;
}

/**
 * Collects quotes for every (venue, symbol) pair concurrently.
 *
 * The returned snapshot holds every quote that arrived before all fetches
 * settled or the deadline fired. Failed fetches, and fetches still running at
 * the deadline, are listed in `failures`. Output order is unspecified.
 *
 * @param venues - Connectors to query
 * @param symbols - Symbols to fetch from every venue
 * @param options - Cancellation, deadline and concurrency
 * @throws {InvalidInputError} When venues or symbols is not an array
 *
 * @example
 * ```typescript
 * const { quotes, failures } = await collectQuotes(connectors, ["BTC/USDT"], { timeoutMs: 5000 });
 * ```
 */
export async function collectQuotes(
  venues: readonly VenueConnector[],
  symbols: readonly string[],
  options: CollectOptions = {},
): Promise<QuoteCollection> {
  if (!isList(venues)) throw new InvalidInputError("venues", "expected an array of connectors");
  if (!isList(symbols)) throw new InvalidInputError("symbols", "expected an array of symbols");

  const tasks: FetchTask[] = venues.flatMap((venue) => symbols.map((symbol) => ({ venue, symbol })));
  const outcomes = await fanOut(
    tasks,
    async ({ venue, symbol }, signal): Promise<Quote> => {
      const quote = await venue.fetchTicker(symbol, signal);
      return { ...quote, venueId: venue.id, symbol };
    },
    options,
  );

  const quotes: Quote[] = [];
  const failures: FetchFailure[] = [];
  tasks.forEach(({ venue, symbol }, index) => {
    const outcome = outcomes[index];
    if (outcome?.ok) {
      quotes.push(outcome.value);
      return;
    }
    failures.push({
      venueId: venue.id,
      symbol,
      operation: "ticker",
      error: outcome ? toError(outcome.error, venue.id) : new FetchCancelledError(venue.id, symbol),
    });
  });
  return { quotes, failures };
}
