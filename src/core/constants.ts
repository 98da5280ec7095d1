/**
 * @fileoverview Global constants for the arbitrage scanner.
 */

// =============================================================================
// Fee Defaults
// =============================================================================

/** Taker fee applied to venues without an explicit schedule: 0.2% */
export const DEFAULT_TAKER_RATE = 0.002;

/** Decimal places kept on emitted opportunities */
export const DISPLAY_PRECISION = 4;

// =============================================================================
// Scan Defaults
// =============================================================================

/** Default minimum net profit percentage (exclusive) */
export const DEFAULT_THRESHOLD_PCT = 0.2;

/** Default aggregation deadline in milliseconds */
export const DEFAULT_SCAN_TIMEOUT_MS = 10_000;

/** Default concurrent fetches during aggregation */
export const DEFAULT_SCAN_CONCURRENCY = 16;

/** Default watch interval in seconds */
export const DEFAULT_WATCH_INTERVAL_SEC = 10;

/** Default symbols to scan */
export const DEFAULT_SYMBOLS = ["BTC/USDT", "ETH/USDT"] as const;

/** Default venues to scan */
export const DEFAULT_VENUES = ["binance", "okx", "bybit"] as const;

/** Default fee table location, relative to the working directory */
export const DEFAULT_FEES_FILE = "config/fees.json";

// =============================================================================
// Connector Defaults
// =============================================================================

/** Default timeout for exchange API calls */
export const DEFAULT_EXCHANGE_TIMEOUT_MS = 30_000;

/** Default timeout for plain HTTP connectors */
export const DEFAULT_HTTP_TIMEOUT_MS = 5_000;

/** DexScreener search API base URL */
export const DEXSCREENER_API = "https://api.dexscreener.com/latest/dex";

/** THORChain Midgard API base URL */
export const THORCHAIN_MIDGARD_API = "https://midgard.ninerealms.com/v2";

/** THORNode API base URL */
export const THORNODE_API = "https://thornode.ninerealms.com/thorchain";

/** THORChain amounts are fixed-point with 8 decimals */
export const THORCHAIN_AMOUNT_SCALE = 1e8;

/** Default DexScreener chain filter */
export const DEFAULT_DEX_CHAIN_ID = "ethereum";

/** Default DexScreener dex filter */
export const DEFAULT_DEX_ID = "uniswap";

// =============================================================================
// Environment Variable Names
// =============================================================================

export const ENV_SYMBOLS = "SCAN_SYMBOLS";
export const ENV_VENUES = "SCAN_VENUES";
export const ENV_THRESHOLD_PCT = "SCAN_THRESHOLD_PCT";
export const ENV_TIMEOUT_MS = "SCAN_TIMEOUT_MS";
export const ENV_CONCURRENCY = "SCAN_CONCURRENCY";
export const ENV_INTERVAL_SEC = "SCAN_INTERVAL_SEC";
export const ENV_FEES_FILE = "SCAN_FEES_FILE";
export const ENV_DEMO_MODE = "SCAN_DEMO_MODE";
export const ENV_REFRESH_FEES = "SCAN_REFRESH_FEES";
export const ENV_DEX_CHAIN_ID = "DEX_CHAIN_ID";
export const ENV_DEX_ID = "DEX_ID";
