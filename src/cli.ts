import dotenv from "dotenv";
import { loadFeeConfig, loadSettings, type Settings } from "./config/settings";
import { createConnectors } from "./exchanges/connectors";
import { formatScanReport } from "./format";
import { ScanOrchestrator, type ScanCycleResult } from "./orchestrator";
import { FeeModel } from "./rates/fees";
import { rankOpportunities } from "./scanner";

export interface CliOptions {
  watch: boolean;
  /** Opportunities to print per cycle; 0 prints all */
  limit: number;
  help: boolean;
}

const USAGE = `Usage: npm start -- [--watch] [--limit N]

  --watch      Rescan every SCAN_INTERVAL_SEC seconds until Ctrl+C
  --limit N    Print at most N opportunities per cycle (default: all)
  --help       Show this message

Settings come from the environment (.env is loaded): SCAN_SYMBOLS, SCAN_VENUES,
SCAN_THRESHOLD_PCT, SCAN_TIMEOUT_MS, SCAN_CONCURRENCY, SCAN_INTERVAL_SEC,
SCAN_FEES_FILE, SCAN_DEMO_MODE, SCAN_REFRESH_FEES, DEX_CHAIN_ID, DEX_ID.`;

function parseLimit(raw: string | undefined, fallback: number): number {
  const trimmed = raw?.trim();
  if (!trimmed) return fallback;
  const value = Number(trimmed);
  return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : fallback;
}

/**
 * Parses command-line flags. Unknown flags are ignored.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { watch: false, limit: 0, help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--watch" || arg === "-w") options.watch = true;
    else if (arg === "--help" || arg === "-h") options.help = true;
    else if (arg === "--limit" || arg === "-n") {
      options.limit = parseLimit(argv[i + 1], options.limit);
      i += 1;
    } else if (arg?.startsWith("--limit=")) {
      options.limit = parseLimit(arg.slice("--limit=".length), options.limit);
    }
  }
  return options;
}

/**
 * Builds the orchestrator from settings: fee table, connectors, fee model.
 */
export async function buildOrchestrator(settings: Settings): Promise<ScanOrchestrator> {
  const feeConfig = await loadFeeConfig(settings.feesFile);
  const venues = createConnectors(settings.venues, {
    demoMode: settings.demoMode,
    timeoutMs: settings.timeoutMs,
    dexChainId: settings.dexChainId,
    dexId: settings.dexId,
  });
  if (venues.length < 2) {
    console.warn(`[CONFIG] Only ${venues.length} venue(s) active; at least 2 are needed to find opportunities`);
  }
  return new ScanOrchestrator(venues, new FeeModel(feeConfig), {
    symbols: settings.symbols,
    thresholdPct: settings.thresholdPct,
    timeoutMs: settings.timeoutMs,
    concurrency: settings.concurrency,
  });
}

function printCycle(result: ScanCycleResult, limit: number): void {
  console.info(formatScanReport(result, rankOpportunities(result.opportunities), limit));
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  dotenv.config();

  const options = parseCliArgs(argv);
  if (options.help) {
    console.info(USAGE);
    return;
  }

  const settings = loadSettings();
  console.info("\n" + "=".repeat(60));
  console.info(`ARBITRAGE SCAN (${settings.demoMode ? "demo" : "live"})`);
  console.info(`venues=${settings.venues.map((v) => `${v.kind}:${v.id}`).join(",")}`);
  console.info(`symbols=${settings.symbols.join(",")} threshold=${settings.thresholdPct}%`);
  console.info("=".repeat(60));

  const orchestrator = await buildOrchestrator(settings);
  const controller = new AbortController();
  const onSigint = () => {
    console.info("\n[SCAN] Stopping...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    if (settings.refreshFees) await orchestrator.refreshTransferFees(controller.signal);

    if (!options.watch) {
      printCycle(await orchestrator.runOnce(controller.signal), options.limit);
      return;
    }
    await orchestrator.watch(
      settings.intervalSec * 1000,
      (result) => printCycle(result, options.limit),
      controller.signal,
    );
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}
