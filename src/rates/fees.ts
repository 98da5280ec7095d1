/**
 * @fileoverview Venue fee schedules.
 * Fee rates are expressed as decimals (e.g., 0.001 = 0.1%); withdrawal fees
 * are fixed amounts in units of the withdrawn asset.
 */

import { DEFAULT_TAKER_RATE } from "../core/constants";
import { ConfigurationError } from "../core/errors";
import type { FeeSchedule, FeeScheduleFragment } from "../core/types";

/**
 * Fee settings for one venue. Omitted fields fall back to the default schedule.
 */
export interface FeeScheduleConfig {
  takerRate?: number;
  withdrawalFees?: Readonly<Record<string, number>>;
}

/**
 * Fee configuration as loaded from the fee table.
 */
export interface FeeModelConfig {
  defaultSchedule?: FeeScheduleConfig;
  venueOverrides?: Readonly<Record<string, FeeScheduleConfig>>;
}

interface ScheduleEntry {
  readonly takerRate: number;
  readonly withdrawalFees: Readonly<Record<string, number>>;
}

function assertNonNegative(value: number, configKey: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(configKey, `expected a finite number >= 0, got ${value}`);
  }
  return value;
}

function normalizeWithdrawalFees(
  fees: Readonly<Record<string, number>>,
  configKey: string,
): Readonly<Record<string, number>> {
  const out: Record<string, number> = {};
  for (const [asset, fee] of Object.entries(fees)) {
    const code = asset.trim().toUpperCase();
    if (!code) continue;
    out[code] = assertNonNegative(fee, `${configKey}.${asset}`);
  }
  return Object.freeze(out);
}

/**
 * Resolves the fee schedule for a venue and looks up withdrawal fees.
 * Instances are immutable; live fee data produces a new model through
 * {@link FeeModel.withTransferFees}.
 *
 * @example
 * ```typescript
 * const model = new FeeModel({ venueOverrides: { binance: { takerRate: 0.001 } } });
 * model.resolve("Binance").takerRate; // 0.001
 * model.resolve("kraken").takerRate;  // 0.002 (default)
 * ```
 */
export class FeeModel {
  private readonly defaults: ScheduleEntry;
  private readonly venues: ReadonlyMap<string, ScheduleEntry>;

  constructor(config: FeeModelConfig = {}) {
    const defaultSchedule = config.defaultSchedule ?? {};
    this.defaults = {
      takerRate: assertNonNegative(defaultSchedule.takerRate ?? DEFAULT_TAKER_RATE, "defaultFeeSchedule.takerRate"),
      withdrawalFees: normalizeWithdrawalFees(defaultSchedule.withdrawalFees ?? {}, "defaultFeeSchedule.withdrawalFees"),
    };

    const venues = new Map<string, ScheduleEntry>();
    for (const [venue, override] of Object.entries(config.venueOverrides ?? {})) {
      const key = venue.trim().toLowerCase();
      venues.set(key, {
        takerRate:
          override.takerRate === undefined
            ? this.defaults.takerRate
            : assertNonNegative(override.takerRate, `venueFeeOverrides.${venue}.takerRate`),
        withdrawalFees:
          override.withdrawalFees === undefined
            ? this.defaults.withdrawalFees
            : normalizeWithdrawalFees(override.withdrawalFees, `venueFeeOverrides.${venue}.withdrawalFees`),
      });
    }
    this.venues = venues;
  }

  /**
   * Returns the schedule for a venue, or the default schedule when the venue
   * has no entry. Never throws.
   */
  resolve(venueId: string): FeeSchedule {
    const entry = this.venues.get(venueId.trim().toLowerCase()) ?? this.defaults;
    return Object.freeze({ venueId, takerRate: entry.takerRate, withdrawalFees: entry.withdrawalFees });
  }

  /**
   * Withdrawal fee for an asset in asset units; 0 when none is configured.
   */
  withdrawalFee(schedule: FeeSchedule, asset: string): number {
    return schedule.withdrawalFees[asset.trim().toUpperCase()] ?? 0;
  }

  /** Venues with an explicit schedule (lower-case). */
  configuredVenues(): string[] {
    return [...this.venues.keys()];
  }

  /**
   * Returns a new model with live transfer fee data layered on top.
   * A null withdrawal fee leaves the configured value in place.
   */
  withTransferFees(fragments: Iterable<FeeScheduleFragment>): FeeModel {
    const merged = new Map<string, { takerRate: number; withdrawalFees: Record<string, number> }>();
    for (const [venue, entry] of this.venues) {
      merged.set(venue, { takerRate: entry.takerRate, withdrawalFees: { ...entry.withdrawalFees } });
    }

    for (const fragment of fragments) {
      const key = fragment.venueId.trim().toLowerCase();
      let entry = merged.get(key);
      if (!entry) {
        entry = { takerRate: this.defaults.takerRate, withdrawalFees: { ...this.defaults.withdrawalFees } };
        merged.set(key, entry);
      }
      if (fragment.takerRate !== undefined) entry.takerRate = fragment.takerRate;
      if (fragment.withdrawalFee !== null) {
        entry.withdrawalFees[fragment.asset.trim().toUpperCase()] = fragment.withdrawalFee;
      }
    }

    return new FeeModel({
      defaultSchedule: this.defaults,
      venueOverrides: Object.fromEntries(merged),
    });
  }
}
