/**
 * @fileoverview Drives scan cycles: collect quotes, scan, report.
 * All collaborators are passed in; nothing is looked up globally.
 */

import { FetchCancelledError, MarketDataError, toError } from "./core/errors";
import { isUsableFragment, type FeeScheduleFragment, type FetchFailure, type Opportunity, type Quote } from "./core/types";
import type { VenueConnector } from "./exchanges/types";
import { collectQuotes } from "./market/quotes";
import { baseAsset } from "./rates/calculations";
import type { FeeModel } from "./rates/fees";
import { scanOpportunities } from "./scanner";
import { fanOut, sleepWithSignal } from "./utils/async";

/**
 * Receives every collected quote snapshot, e.g. to persist ticks.
 */
export interface TickSink {
  saveTicks(quotes: readonly Quote[]): Promise<void>;
}

export type ScanLogger = Pick<Console, "info" | "warn">;

export interface ScanSettings {
  readonly symbols: readonly string[];
  /** Minimum profit percentage, exclusive */
  readonly thresholdPct: number;
  /** Aggregation deadline in milliseconds */
  readonly timeoutMs?: number;
  /** Maximum fetches in flight */
  readonly concurrency?: number;
}

export interface OrchestratorOptions {
  sink?: TickSink;
  log?: ScanLogger;
  now?: () => number;
}

export interface ScanCycleResult {
  readonly opportunities: readonly Opportunity[];
  readonly failures: readonly FetchFailure[];
  /** Quotes in the snapshot, valid or not */
  readonly quoteCount: number;
  readonly startedAt: number;
  readonly finishedAt: number;
}

export class ScanOrchestrator {
  private currentFeeModel: FeeModel;
  private readonly log: ScanLogger;
  private readonly now: () => number;

  constructor(
    private readonly venues: readonly VenueConnector[],
    feeModel: FeeModel,
    private readonly settings: ScanSettings,
    private readonly options: OrchestratorOptions = {},
  ) {
    this.currentFeeModel = feeModel;
    this.log = options.log ?? console;
    this.now = options.now ?? Date.now;
  }

  /** Fee model used by the next scan. */
  get feeModel(): FeeModel {
    return this.currentFeeModel;
  }

  /**
   * Runs one collect-then-scan cycle. Fetch and sink failures are reported,
   * never thrown.
   */
  async runOnce(signal?: AbortSignal): Promise<ScanCycleResult> {
    const startedAt = this.now();
    const { quotes, failures } = await collectQuotes(this.venues, this.settings.symbols, {
      signal,
      timeoutMs: this.settings.timeoutMs,
      concurrency: this.settings.concurrency,
    });

    if (this.options.sink) {
      try {
        await this.options.sink.saveTicks(quotes);
      } catch (error) {
        this.log.warn(`[SCAN] Tick sink failed: ${toError(error, "sink").message}`);
      }
    }

    const opportunities = scanOpportunities(quotes, this.currentFeeModel, this.settings.thresholdPct);
    for (const failure of failures) {
      this.log.warn(`[SCAN] ${failure.venueId} ${failure.symbol} skipped: ${failure.error.message}`);
    }
    this.log.info(
      `[SCAN] ${quotes.length} quotes, ${failures.length} failures, ${opportunities.length} opportunities ` +
        `(threshold ${this.settings.thresholdPct}%)`,
    );

    return { opportunities, failures, quoteCount: quotes.length, startedAt, finishedAt: this.now() };
  }

  /**
   * Fetches live withdrawal fees for every venue and base asset of the
   * configured symbols, and swaps in a fee model carrying them.
   *
   * Fragments with negative or non-finite amounts are reported as failures
   * and left out of the model.
   *
   * @returns Fetches that failed, returned unusable fees, or were abandoned at the deadline
   */
  async refreshTransferFees(signal?: AbortSignal): Promise<FetchFailure[]> {
    const assets = [...new Set(this.settings.symbols.map(baseAsset))];
    const tasks = this.venues.flatMap((venue) => assets.map((asset) => ({ venue, asset })));
    const outcomes = await fanOut(tasks, ({ venue, asset }, deadline) => venue.fetchTransferFees(asset, deadline), {
      signal,
      timeoutMs: this.settings.timeoutMs,
      concurrency: this.settings.concurrency,
    });

    const fragments: FeeScheduleFragment[] = [];
    const failures: FetchFailure[] = [];
    tasks.forEach(({ venue, asset }, index) => {
      const outcome = outcomes[index];
      if (outcome?.ok && isUsableFragment(outcome.value)) {
        fragments.push(outcome.value);
        return;
      }
      let error: Error;
      if (outcome?.ok) {
        const { withdrawalFee, takerRate } = outcome.value;
        error = new MarketDataError(
          asset,
          `Invalid transfer fee from ${venue.id}: withdrawalFee=${withdrawalFee}, takerRate=${takerRate}`,
        );
      } else {
        error = outcome ? toError(outcome.error, venue.id) : new FetchCancelledError(venue.id, asset);
      }
      failures.push({ venueId: venue.id, symbol: asset, operation: "transferFees", error });
      this.log.warn(`[FEES] ${venue.id} ${asset} transfer fees unavailable: ${error.message}`);
    });

    this.currentFeeModel = this.currentFeeModel.withTransferFees(fragments);
    this.log.info(`[FEES] Refreshed ${fragments.length} transfer fee entries (${failures.length} failures)`);
    return failures;
  }

  /**
   * Runs cycles every `intervalMs` until `signal` aborts. Errors from
   * `onCycle` are logged and the loop continues. A cycle cut short by the
   * abort is not reported.
   */
  async watch(
    intervalMs: number,
    onCycle: (result: ScanCycleResult) => void | Promise<void>,
    signal: AbortSignal,
  ): Promise<void> {
    while (!signal.aborted) {
      const result = await this.runOnce(signal);
      if (signal.aborted) return;
      try {
        await onCycle(result);
      } catch (error) {
        this.log.warn(`[SCAN] Cycle handler failed: ${toError(error, "watch").message}`);
      }
      await sleepWithSignal(intervalMs, signal);
    }
  }
}
