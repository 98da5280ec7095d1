import { describe, expect, it, vi } from "vitest";
import { THORCHAIN_MIDGARD_API, THORNODE_API } from "../src/core/constants";
import { MarketDataError } from "../src/core/errors";
import { BridgeConnector, poolAssetFor } from "../src/exchanges/bridge_connector";

function stubFetch(body: unknown) {
  const fetchMock = vi.fn(async (_input: string | URL | Request) => new Response(JSON.stringify(body), { status: 200 }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

const inboundAddresses = [
  { chain: "BTC", address: "bc1-test", outbound_fee: "15000" },
  { chain: "ETH", address: "0x-test", outbound_fee: "120000" },
  { chain: "BSC", address: "0x-test", halted: true },
];

describe("poolAssetFor", () => {
  it("maps base assets to native pools", () => {
    expect(poolAssetFor("btc")).toBe("BTC.BTC");
    expect(poolAssetFor("BNB")).toBe("BSC.BNB");
    expect(poolAssetFor("ATOM")).toBe("GAIA.ATOM");
    expect(poolAssetFor("SOL")).toBeNull();
  });
});

describe("BridgeConnector", () => {
  const connector = new BridgeConnector("thorchain", { now: () => 9 });

  it("quotes the pool USD price as bid and ask", async () => {
    const fetchMock = stubFetch({ asset: "BTC.BTC", assetPriceUSD: "61234.5", status: "available" });

    await expect(connector.fetchTicker("BTC/USDT")).resolves.toEqual({
      venueId: "thorchain",
      symbol: "BTC/USDT",
      bid: 61234.5,
      ask: 61234.5,
      observedAt: 9,
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${THORCHAIN_MIDGARD_API}/pool/BTC.BTC`);
  });

  it("rejects symbols without a pool before fetching", async () => {
    const fetchMock = stubFetch({});
    await expect(connector.fetchTicker("SOL/USDT")).rejects.toThrow(MarketDataError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects an invalid pool price", async () => {
    stubFetch({ asset: "ETH.ETH", assetPriceUSD: "NaN" });
    await expect(connector.fetchTicker("ETH/USDT")).rejects.toThrow("Invalid pool price 'NaN'");
  });

  it("converts the chain outbound fee to asset units", async () => {
    const fetchMock = stubFetch(inboundAddresses);

    await expect(connector.fetchTransferFees("btc")).resolves.toEqual({
      venueId: "thorchain",
      asset: "BTC",
      withdrawalFee: 0.00015,
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${THORNODE_API}/inbound_addresses`);
  });

  it("reports null when the chain has no outbound fee", async () => {
    stubFetch(inboundAddresses);
    const fragment = await connector.fetchTransferFees("BNB");
    expect(fragment.withdrawalFee).toBeNull();
  });

  it("reports null for assets without a pool", async () => {
    const fetchMock = stubFetch(inboundAddresses);
    const fragment = await connector.fetchTransferFees("SOL");
    expect(fragment.withdrawalFee).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("throws on an unexpected inbound payload", async () => {
    stubFetch({ chains: [] });
    await expect(connector.fetchTransferFees("ETH")).rejects.toThrow(MarketDataError);
  });
});
