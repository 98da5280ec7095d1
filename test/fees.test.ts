import { describe, expect, it } from "vitest";
import { DEFAULT_TAKER_RATE } from "../src/core/constants";
import { ConfigurationError } from "../src/core/errors";
import { FeeModel } from "../src/rates/fees";

describe("FeeModel", () => {
  const model = new FeeModel({
    defaultSchedule: { takerRate: 0.002, withdrawalFees: { btc: 0.0005, ETH: 0.005 } },
    venueOverrides: {
      Binance: { takerRate: 0.001, withdrawalFees: { BTC: 0.0002 } },
      okx: { takerRate: 0.0008 },
    },
  });

  it("resolves venue overrides case-insensitively", () => {
    const schedule = model.resolve("BINANCE");
    expect(schedule.venueId).toBe("BINANCE");
    expect(schedule.takerRate).toBe(0.001);
    expect(schedule.withdrawalFees).toEqual({ BTC: 0.0002 });
  });

  it("falls back to the default schedule for unknown venues", () => {
    const schedule = model.resolve("kraken");
    expect(schedule.venueId).toBe("kraken");
    expect(schedule.takerRate).toBe(0.002);
    expect(model.withdrawalFee(schedule, "BTC")).toBe(0.0005);
  });

  it("uses the built-in taker rate without a config", () => {
    const schedule = new FeeModel().resolve("anything");
    expect(schedule.takerRate).toBe(DEFAULT_TAKER_RATE);
    expect(schedule.withdrawalFees).toEqual({});
  });

  it("inherits default withdrawal fees when an override omits them", () => {
    const schedule = model.resolve("okx");
    expect(schedule.takerRate).toBe(0.0008);
    expect(model.withdrawalFee(schedule, "eth")).toBe(0.005);
  });

  it("replaces the default withdrawal map when an override sets one", () => {
    const schedule = model.resolve("binance");
    expect(model.withdrawalFee(schedule, "BTC")).toBe(0.0002);
    expect(model.withdrawalFee(schedule, "ETH")).toBe(0);
  });

  it("returns 0 for assets without a withdrawal fee", () => {
    expect(model.withdrawalFee(model.resolve("kraken"), "DOGE")).toBe(0);
  });

  it("returns frozen schedules", () => {
    expect(Object.isFrozen(model.resolve("binance"))).toBe(true);
  });

  it("lists configured venues in lower case", () => {
    expect(model.configuredVenues().sort()).toEqual(["binance", "okx"]);
  });

  it("rejects negative rates and fees", () => {
    expect(() => new FeeModel({ defaultSchedule: { takerRate: -0.1 } })).toThrow(ConfigurationError);
    expect(() => new FeeModel({ venueOverrides: { okx: { withdrawalFees: { BTC: -1 } } } })).toThrow(
      ConfigurationError,
    );
  });

  describe("withTransferFees", () => {
    it("layers live withdrawal fees over configured ones", () => {
      const refreshed = model.withTransferFees([
        { venueId: "binance", asset: "eth", withdrawalFee: 0.0012 },
        { venueId: "bybit", asset: "BTC", withdrawalFee: 0.0003, takerRate: 0.001 },
      ]);

      const binance = refreshed.resolve("binance");
      expect(binance.takerRate).toBe(0.001);
      expect(binance.withdrawalFees).toEqual({ BTC: 0.0002, ETH: 0.0012 });

      const bybit = refreshed.resolve("bybit");
      expect(bybit.takerRate).toBe(0.001);
      expect(bybit.withdrawalFees).toEqual({ BTC: 0.0003, ETH: 0.005 });
    });

    it("keeps configured values for null fragments", () => {
      const refreshed = model.withTransferFees([{ venueId: "binance", asset: "BTC", withdrawalFee: null }]);
      expect(refreshed.withdrawalFee(refreshed.resolve("binance"), "BTC")).toBe(0.0002);
    });

    it("leaves the original model untouched", () => {
      model.withTransferFees([{ venueId: "binance", asset: "BTC", withdrawalFee: 0.1 }]);
      expect(model.withdrawalFee(model.resolve("binance"), "BTC")).toBe(0.0002);
    });
  });
});
