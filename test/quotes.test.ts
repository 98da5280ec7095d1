import { describe, expect, it } from "vitest";
import { ExchangeApiError, FetchCancelledError, InvalidInputError } from "../src/core/errors";
import type { FeeScheduleFragment, Quote, VenueKind } from "../src/core/types";
import type { VenueConnector } from "../src/exchanges/types";
import { collectQuotes } from "../src/market/quotes";

type TickerBehavior = (symbol: string, signal?: AbortSignal) => Promise<Quote>;

class StubConnector implements VenueConnector {
  readonly kind: VenueKind = "simulated";
  calls = 0;

  constructor(
    readonly id: string,
    private readonly behavior: TickerBehavior,
  ) {}

  fetchTicker(symbol: string, signal?: AbortSignal): Promise<Quote> {
    this.calls += 1;
    return this.behavior(symbol, signal);
  }

  async fetchTransferFees(asset: string): Promise<FeeScheduleFragment> {
    return { venueId: this.id, asset, withdrawalFee: null };
  }
}

function fixed(bid: number, ask: number): TickerBehavior {
  return async (symbol) => ({ venueId: "ignored", symbol, bid, ask, observedAt: 1_000 });
}

const failing: TickerBehavior = async () => {
  throw new ExchangeApiError("down", "connection refused");
};

const hanging: TickerBehavior = () => new Promise<Quote>(() => undefined);

describe("collectQuotes", () => {
  it("returns successes and records failures without throwing", async () => {
    const venues = [
      new StubConnector("a", fixed(99, 100)),
      new StubConnector("b", fixed(101, 102)),
      new StubConnector("down", failing),
    ];

    const { quotes, failures } = await collectQuotes(venues, ["BTC/USDT"]);

    expect(quotes).toHaveLength(2);
    expect(quotes.map((q) => q.venueId).sort()).toEqual(["a", "b"]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.venueId).toBe("down");
    expect(failures[0]?.symbol).toBe("BTC/USDT");
    expect(failures[0]?.operation).toBe("ticker");
    expect(failures[0]?.error).toBeInstanceOf(ExchangeApiError);
  });

  it("wraps non-Error rejections", async () => {
    const venue = new StubConnector("odd", () => Promise.reject("socket hang up"));
    const { failures } = await collectQuotes([venue], ["BTC/USDT"]);
    expect(failures[0]?.error).toBeInstanceOf(ExchangeApiError);
    expect(failures[0]?.error.message).toBe("[odd] socket hang up");
  });

  it("stamps quotes with the connector id and requested symbol", async () => {
    const { quotes } = await collectQuotes([new StubConnector("okx", fixed(1, 2))], ["ETH/USDT"]);
    expect(quotes).toEqual([{ venueId: "okx", symbol: "ETH/USDT", bid: 1, ask: 2, observedAt: 1_000 }]);
  });

  it("fetches every venue and symbol combination", async () => {
    const venues = [new StubConnector("a", fixed(1, 2)), new StubConnector("b", fixed(1, 2))];
    const { quotes } = await collectQuotes(venues, ["BTC/USDT", "ETH/USDT", "SOL/USDT"], { concurrency: 2 });
    expect(quotes).toHaveLength(6);
    expect(venues.map((v) => v.calls)).toEqual([3, 3]);
  });

  it("reports fetches still running at the deadline as cancelled", async () => {
    const venues = [new StubConnector("fast", fixed(99, 100)), new StubConnector("stuck", hanging)];

    const { quotes, failures } = await collectQuotes(venues, ["BTC/USDT"], { timeoutMs: 20 });

    expect(quotes.map((q) => q.venueId)).toEqual(["fast"]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.venueId).toBe("stuck");
    expect(failures[0]?.error).toBeInstanceOf(FetchCancelledError);
  });

  it("passes an abort signal to connectors", async () => {
    let seen: AbortSignal | undefined;
    const venue = new StubConnector("a", async (symbol, signal) => {
      seen = signal;
      return { venueId: "a", symbol, bid: 1, ask: 2, observedAt: 0 };
    });

    await collectQuotes([venue], ["BTC/USDT"], { timeoutMs: 1_000 });
    expect(seen).toBeInstanceOf(AbortSignal);
  });

  it("starts nothing when the caller has already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const venue = new StubConnector("a", fixed(1, 2));

    const { quotes, failures } = await collectQuotes([venue], ["BTC/USDT"], { signal: controller.signal });

    expect(venue.calls).toBe(0);
    expect(quotes).toEqual([]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.error).toBeInstanceOf(FetchCancelledError);
  });

  it("returns an empty snapshot for no venues or no symbols", async () => {
    expect(await collectQuotes([], ["BTC/USDT"])).toEqual({ quotes: [], failures: [] });
    expect(await collectQuotes([new StubConnector("a", fixed(1, 2))], [])).toEqual({ quotes: [], failures: [] });
  });

  it("rejects non-array arguments", async () => {
    await expect(collectQuotes(null as unknown as VenueConnector[], [])).rejects.toThrow(InvalidInputError);
    await expect(collectQuotes([], "BTC/USDT" as unknown as string[])).rejects.toThrow(InvalidInputError);
  });
});
