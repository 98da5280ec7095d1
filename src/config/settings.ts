/**
 * @fileoverview Runtime settings from the environment and the JSON fee table.
 * `.env` is loaded by the CLI through dotenv before these run.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_DEX_CHAIN_ID,
  DEFAULT_DEX_ID,
  DEFAULT_FEES_FILE,
  DEFAULT_SCAN_CONCURRENCY,
  DEFAULT_SCAN_TIMEOUT_MS,
  DEFAULT_SYMBOLS,
  DEFAULT_THRESHOLD_PCT,
  DEFAULT_VENUES,
  DEFAULT_WATCH_INTERVAL_SEC,
  ENV_CONCURRENCY,
  ENV_DEMO_MODE,
  ENV_DEX_CHAIN_ID,
  ENV_DEX_ID,
  ENV_FEES_FILE,
  ENV_INTERVAL_SEC,
  ENV_REFRESH_FEES,
  ENV_SYMBOLS,
  ENV_THRESHOLD_PCT,
  ENV_TIMEOUT_MS,
  ENV_VENUES,
} from "../core/constants";
import { ConfigurationError } from "../core/errors";
import type { VenueSpec } from "../exchanges/types";
import { parseVenueSpec } from "../exchanges/connectors";
import type { FeeModelConfig } from "../rates/fees";

// =============================================================================
// Preprocessors
// =============================================================================

const toInt = (def: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toFloat = (def: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number());

const toBool = (def: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    if (typeof v === "boolean") return v;
    const s = String(v).trim().toLowerCase();
    if (["true", "1", "yes", "y", "on"].includes(s)) return true;
    if (["false", "0", "no", "n", "off"].includes(s)) return false;
    return v;
  }, z.boolean());

const csv = (def: readonly string[]) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return [...def];
    const s = String(v).trim();
    if (!s) return [...def];
    return s.split(",").map((x) => x.trim()).filter(Boolean);
  }, z.array(z.string()).min(1));

const toText = (def: string) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return def;
    const s = String(v).trim();
    return s || def;
  }, z.string());

// =============================================================================
// Environment
// =============================================================================

const envSchema = z.object({
  [ENV_SYMBOLS]: csv(DEFAULT_SYMBOLS).transform((symbols) => symbols.map((s) => s.toUpperCase())),
  [ENV_VENUES]: csv(DEFAULT_VENUES),
  [ENV_THRESHOLD_PCT]: toFloat(DEFAULT_THRESHOLD_PCT),
  [ENV_TIMEOUT_MS]: toInt(DEFAULT_SCAN_TIMEOUT_MS).pipe(z.number().int().min(1)),
  [ENV_CONCURRENCY]: toInt(DEFAULT_SCAN_CONCURRENCY).pipe(z.number().int().min(1).max(256)),
  [ENV_INTERVAL_SEC]: toInt(DEFAULT_WATCH_INTERVAL_SEC).pipe(z.number().int().min(1)),
  [ENV_FEES_FILE]: toText(DEFAULT_FEES_FILE),
  [ENV_DEMO_MODE]: toBool(true),
  [ENV_REFRESH_FEES]: toBool(false),
  [ENV_DEX_CHAIN_ID]: toText(DEFAULT_DEX_CHAIN_ID),
  [ENV_DEX_ID]: toText(DEFAULT_DEX_ID),
});

/**
 * Validated scanner settings.
 */
export interface Settings {
  readonly symbols: readonly string[];
  readonly venues: readonly VenueSpec[];
  readonly thresholdPct: number;
  readonly timeoutMs: number;
  readonly concurrency: number;
  readonly intervalSec: number;
  readonly feesFile: string;
  readonly demoMode: boolean;
  readonly refreshFees: boolean;
  readonly dexChainId: string;
  readonly dexId: string;
}

/**
 * Reads settings from environment variables, applying defaults.
 *
 * @throws {ConfigurationError} Naming the first invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") || "env";
    throw new ConfigurationError(key, issue?.message ?? "invalid value", parsed.error);
  }

  const data = parsed.data;
  return {
    symbols: data[ENV_SYMBOLS],
    venues: data[ENV_VENUES].map(parseVenueSpec),
    thresholdPct: data[ENV_THRESHOLD_PCT],
    timeoutMs: data[ENV_TIMEOUT_MS],
    concurrency: data[ENV_CONCURRENCY],
    intervalSec: data[ENV_INTERVAL_SEC],
    feesFile: data[ENV_FEES_FILE],
    demoMode: data[ENV_DEMO_MODE],
    refreshFees: data[ENV_REFRESH_FEES],
    dexChainId: data[ENV_DEX_CHAIN_ID],
    dexId: data[ENV_DEX_ID],
  };
}

// =============================================================================
// Fee Table
// =============================================================================

const scheduleSchema = z
  .object({
    takerRate: z.number().min(0).optional(),
    withdrawalFees: z.record(z.number().min(0)).optional(),
  })
  .strict();

const feeFileSchema = z
  .object({
    defaultFeeSchedule: scheduleSchema.optional(),
    venueFeeOverrides: z.record(scheduleSchema).optional(),
  })
  .strict();

/**
 * Parses fee table JSON text.
 *
 * @throws {ConfigurationError} When the text is not valid JSON or has the wrong shape
 */
export function parseFeeConfig(text: string, source = "fees"): FeeModelConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(source, "Fee table is not valid JSON", error);
  }

  const parsed = feeFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `${source}:${issue?.path.join(".") ?? ""}`,
      issue?.message ?? "invalid fee table",
      parsed.error,
    );
  }
  return {
    defaultSchedule: parsed.data.defaultFeeSchedule,
    venueOverrides: parsed.data.venueFeeOverrides,
  };
}

/**
 * Loads the fee table. A missing file yields an empty config (all defaults).
 *
 * @param filePath - Path relative to `cwd`, or absolute
 * @throws {ConfigurationError} When the file exists but cannot be parsed
 */
export async function loadFeeConfig(filePath: string, cwd: string = process.cwd()): Promise<FeeModelConfig> {
  const resolved = path.resolve(cwd, filePath);
  let text: string;
  try {
    text = await fs.readFile(resolved, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      console.warn(`[CONFIG] Fee table not found at ${resolved}; using default fees`);
      return {};
    }
    throw new ConfigurationError(ENV_FEES_FILE, `Cannot read ${resolved}`, error);
  }
  return parseFeeConfig(text, resolved);
}
