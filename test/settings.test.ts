import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../src/core/errors";
import { loadFeeConfig, loadSettings, parseFeeConfig } from "../src/config/settings";
import { FeeModel } from "../src/rates/fees";

describe("loadSettings", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadSettings({})).toEqual({
      symbols: ["BTC/USDT", "ETH/USDT"],
      venues: [
        { kind: "cex", id: "binance" },
        { kind: "cex", id: "okx" },
        { kind: "cex", id: "bybit" },
      ],
      thresholdPct: 0.2,
      timeoutMs: 10_000,
      concurrency: 16,
      intervalSec: 10,
      feesFile: "config/fees.json",
      demoMode: true,
      refreshFees: false,
      dexChainId: "ethereum",
      dexId: "uniswap",
    });
  });

  it("parses values from the environment", () => {
    const settings = loadSettings({
      SCAN_SYMBOLS: "sol/usdt, eth/usdc,",
      SCAN_VENUES: "kraken,dex:uniswap,bridge:thorchain",
      SCAN_THRESHOLD_PCT: "-0.5",
      SCAN_TIMEOUT_MS: " 2500 ",
      SCAN_CONCURRENCY: "4",
      SCAN_DEMO_MODE: "off",
      SCAN_REFRESH_FEES: "yes",
      DEX_CHAIN_ID: "arbitrum",
    });

    expect(settings.symbols).toEqual(["SOL/USDT", "ETH/USDC"]);
    expect(settings.venues).toEqual([
      { kind: "cex", id: "kraken" },
      { kind: "dex", id: "uniswap" },
      { kind: "bridge", id: "thorchain" },
    ]);
    expect(settings.thresholdPct).toBe(-0.5);
    expect(settings.timeoutMs).toBe(2500);
    expect(settings.concurrency).toBe(4);
    expect(settings.demoMode).toBe(false);
    expect(settings.refreshFees).toBe(true);
    expect(settings.dexChainId).toBe("arbitrum");
    expect(settings.dexId).toBe("uniswap");
  });

  it("names the invalid variable", () => {
    expect(() => loadSettings({ SCAN_TIMEOUT_MS: "soon" })).toThrow("[Config:SCAN_TIMEOUT_MS]");
    expect(() => loadSettings({ SCAN_CONCURRENCY: "0" })).toThrow("[Config:SCAN_CONCURRENCY]");
    expect(() => loadSettings({ SCAN_DEMO_MODE: "maybe" })).toThrow("[Config:SCAN_DEMO_MODE]");
    expect(() => loadSettings({ SCAN_VENUES: "futures:binance" })).toThrow("[Config:SCAN_VENUES]");
  });
});

describe("parseFeeConfig", () => {
  it("maps the fee table keys", () => {
    const config = parseFeeConfig(
      JSON.stringify({
        defaultFeeSchedule: { takerRate: 0.002 },
        venueFeeOverrides: { okx: { takerRate: 0.001, withdrawalFees: { BTC: 0.0001 } } },
      }),
    );
    expect(config).toEqual({
      defaultSchedule: { takerRate: 0.002 },
      venueOverrides: { okx: { takerRate: 0.001, withdrawalFees: { BTC: 0.0001 } } },
    });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseFeeConfig("{ nope", "fees.json")).toThrow("Fee table is not valid JSON");
  });

  it("rejects unknown keys and negative values", () => {
    expect(() => parseFeeConfig(JSON.stringify({ makerRate: 0.001 }))).toThrow(ConfigurationError);
    expect(() => parseFeeConfig(JSON.stringify({ defaultFeeSchedule: { takerRate: -1 } }))).toThrow(
      ConfigurationError,
    );
  });
});

describe("loadFeeConfig", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "fees-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads the bundled fee table", async () => {
    const file = fileURLToPath(new URL("../config/fees.json", import.meta.url));
    const model = new FeeModel(await loadFeeConfig(file));
    expect(model.resolve("binance").takerRate).toBe(0.001);
    expect(model.withdrawalFee(model.resolve("okx"), "BTC")).toBe(0.0001);
    expect(model.resolve("kraken").takerRate).toBe(0.002);
  });

  it("falls back to an empty config when the file is missing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await expect(loadFeeConfig("missing.json", dir)).resolves.toEqual({});
    expect(warn).toHaveBeenCalledWith(`[CONFIG] Fee table not found at ${path.join(dir, "missing.json")}; using default fees`);
  });

  it("throws for a malformed file", async () => {
    await writeFile(path.join(dir, "fees.json"), "[1, 2, 3]", "utf8");
    await expect(loadFeeConfig("fees.json", dir)).rejects.toThrow(ConfigurationError);
  });
});
