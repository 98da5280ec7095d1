/**
 * @fileoverview Custom error types for the arbitrage scanner.
 * All errors extend ArbitrageError for consistent error handling.
 */

/**
 * Base error class for all arbitrage-related errors.
 * Provides consistent error structure with optional cause chaining.
 */
export class ArbitrageError extends Error {
  public override readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.cause = cause;
    this.name = "ArbitrageError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Error thrown when exchange API calls fail.
 * Includes the exchange name for debugging.
 */
export class ExchangeApiError extends ArbitrageError {
  constructor(
    public readonly exchange: string,
    message: string,
    cause?: unknown
  ) {
    super(`[${exchange}] ${message}`, cause);
    this.name = "ExchangeApiError";
  }
}

/**
 * Error thrown when market data is unavailable or invalid.
 * Includes the symbol for context.
 */
export class MarketDataError extends ArbitrageError {
  constructor(
    public readonly symbol: string,
    message: string,
    cause?: unknown
  ) {
    super(`[${symbol}] ${message}`, cause);
    this.name = "MarketDataError";
  }
}

/**
 * Error thrown when HTTP requests fail.
 * Includes URL and status code for debugging.
 */
export class HttpError extends ArbitrageError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    message: string,
    cause?: unknown
  ) {
    super(`HTTP ${status} - ${url}: ${message}`, cause);
    this.name = "HttpError";
  }
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends ArbitrageError {
  constructor(
    public readonly configKey: string,
    message: string,
    cause?: unknown
  ) {
    super(`[Config:${configKey}] ${message}`, cause);
    this.name = "ConfigurationError";
  }
}

/**
 * Error thrown when a caller passes structurally invalid arguments.
 */
export class InvalidInputError extends ArbitrageError {
  constructor(
    public readonly argument: string,
    message: string
  ) {
    super(`[Input:${argument}] ${message}`);
    this.name = "InvalidInputError";
  }
}

/**
 * Recorded for a fetch still outstanding when the aggregation deadline fired.
 */
export class FetchCancelledError extends ArbitrageError {
  constructor(
    public readonly venue: string,
    public readonly symbol: string,
    cause?: unknown
  ) {
    super(`[${venue}:${symbol}] Fetch abandoned at deadline`, cause);
    this.name = "FetchCancelledError";
  }
}

/**
 * Normalizes an unknown rejection into an Error.
 */
export function toError(value: unknown, exchange: string): Error {
  if (value instanceof Error) return value;
  return new ExchangeApiError(exchange, String(value), value);
}
