/**
 * @fileoverview Centralized exchange connector backed by CCXT.
 * Provides standardized exchange initialization with optional authentication.
 */

import ccxt from "ccxt";
import type { Exchange } from "ccxt";
import { z } from "zod";
import { DEFAULT_EXCHANGE_TIMEOUT_MS } from "../core/constants";
import { ConfigurationError, ExchangeApiError, MarketDataError } from "../core/errors";
import type { FeeScheduleFragment, Quote } from "../core/types";
import type { VenueConnector } from "./types";

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Exchange initialization options.
 */
export interface ExchangeOptions {
  /** Whether API keys are required */
  requireKeys?: boolean;
  /** Custom timeout in milliseconds */
  timeout?: number;
  /** Environment to read keys from, defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * The slice of a CCXT exchange this connector calls.
 */
export interface CcxtExchange {
  readonly id: string;
  readonly has: Readonly<Record<string, unknown>>;
  fetchTicker(symbol: string): Promise<{ bid?: number | null; ask?: number | null; timestamp?: number | null }>;
  fetchDepositWithdrawFees(codes?: string[]): Promise<unknown>;
}

type ExchangeConstructor = new (params: Record<string, unknown>) => Exchange;

// =============================================================================
// Transfer Fee Payload
// =============================================================================

const feeEntrySchema = z
  .object({
    fee: z.number().nullish(),
    percentage: z.boolean().nullish(),
  })
  .passthrough();

const depositWithdrawFeeSchema = z
  .object({
    withdraw: feeEntrySchema.nullish(),
    networks: z.record(z.object({ withdraw: feeEntrySchema.nullish() }).passthrough()).nullish(),
  })
  .passthrough();

const depositWithdrawFeesSchema = z.record(depositWithdrawFeeSchema);

type FeeEntry = z.infer<typeof feeEntrySchema>;

function fixedFee(entry: FeeEntry | null | undefined): number | null {
  if (!entry || entry.percentage === true) return null;
  const fee = entry.fee;
  return typeof fee === "number" && Number.isFinite(fee) && fee >= 0 ? fee : null;
}

/**
 * Picks the withdrawal fee for an asset from a CCXT `fetchDepositWithdrawFees`
 * payload: the top-level fixed fee, else the cheapest fixed network fee.
 * Percentage-based fees are ignored.
 *
 * @returns Fee in asset units, or null when none is reported
 * @throws {MarketDataError} When the payload does not have the CCXT shape
 */
export function withdrawalFeeFromPayload(payload: unknown, asset: string): number | null {
  const parsed = depositWithdrawFeesSchema.safeParse(payload);
  if (!parsed.success) {
    throw new MarketDataError(asset, `Unexpected deposit/withdraw fee payload: ${parsed.error.message}`);
  }

  const entry = parsed.data[asset];
  if (!entry) return null;

  const topLevel = fixedFee(entry.withdraw);
  if (topLevel !== null) return topLevel;

  const networkFees = Object.values(entry.networks ?? {})
    .map((network) => fixedFee(network.withdraw))
    .filter((fee): fee is number => fee !== null);
  return networkFees.length ? Math.min(...networkFees) : null;
}

// =============================================================================
// Connector
// =============================================================================

/**
 * Venue connector over a CCXT exchange instance.
 */
export class CexConnector implements VenueConnector {
  readonly kind = "cex" as const;

  constructor(
    readonly id: string,
    private readonly exchange: CcxtExchange,
    private readonly now: () => number = Date.now,
  ) {}

  async fetchTicker(symbol: string): Promise<Quote> {
    try {
      const ticker = await this.exchange.fetchTicker(symbol);
      return {
        venueId: this.id,
        symbol,
        bid: ticker.bid ?? null,
        ask: ticker.ask ?? null,
        observedAt: ticker.timestamp ?? this.now(),
      };
    } catch (error) {
      throw new ExchangeApiError(this.id, `fetchTicker ${symbol} failed`, error);
    }
  }

  async fetchTransferFees(asset: string): Promise<FeeScheduleFragment> {
    const code = asset.toUpperCase();
    if (!this.exchange.has["fetchDepositWithdrawFees"]) {
      return { venueId: this.id, asset: code, withdrawalFee: null };
    }

    let payload: unknown;
    try {
      payload = await this.exchange.fetchDepositWithdrawFees([code]);
    } catch (error) {
      throw new ExchangeApiError(this.id, `fetchDepositWithdrawFees ${code} failed`, error);
    }
    return { venueId: this.id, asset: code, withdrawalFee: withdrawalFeeFromPayload(payload, code) };
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Gets an environment variable from multiple possible names.
 *
 * @returns The first non-empty value found, or empty string
 */
function getEnv(env: NodeJS.ProcessEnv, ...names: string[]): string {
  for (const name of names) {
    const value = (env[name] ?? "").trim();
    if (value) {
      return value;
    }
  }
  return "";
}

/**
 * Creates a CCXT exchange by id (e.g., "binance", "okx") wrapped as a connector.
 * Keys are read from `<ID>_API_KEY` / `<ID>_API_SECRET` (and `<ID>_API_PASSPHRASE`).
 *
 * @throws {ConfigurationError} When the id is unknown or keys are required but missing
 */
export function createCexConnector(exchangeId: string, options: ExchangeOptions = {}): CexConnector {
  const { requireKeys = false, timeout, env = process.env } = options;
  const id = exchangeId.trim().toLowerCase();
  const registry = ccxt as unknown as Record<string, ExchangeConstructor | undefined>;
  const ExchangeClass = ccxt.exchanges.includes(id) ? registry[id] : undefined;
  if (!ExchangeClass) {
    throw new ConfigurationError("SCAN_VENUES", `Exchange '${id}' is not supported by ccxt`);
  }

  const prefix = id.toUpperCase();
  const apiKey = getEnv(env, `${prefix}_API_KEY`);
  const secret = getEnv(env, `${prefix}_API_SECRET`, `${prefix}_SECRET_KEY`);
  const passphrase = getEnv(env, `${prefix}_API_PASSPHRASE`, `${prefix}_PASSPHRASE`);

  if (requireKeys && !(apiKey && secret)) {
    throw new ConfigurationError(`${prefix}_API_KEY`, `Missing ${id} API keys (${prefix}_API_KEY / ${prefix}_API_SECRET)`);
  }

  const params: Record<string, unknown> = {
    enableRateLimit: true,
    timeout: timeout ?? DEFAULT_EXCHANGE_TIMEOUT_MS,
    options: { defaultType: "spot" },
  };
  if (apiKey && secret) {
    params.apiKey = apiKey;
    params.secret = secret;
    if (passphrase) params.password = passphrase;
  }

  return new CexConnector(id, new ExchangeClass(params));
}
