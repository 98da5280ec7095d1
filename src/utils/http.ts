/**
 * @fileoverview HTTP utility functions with timeout support.
 */

import { DEFAULT_HTTP_TIMEOUT_MS } from "../core/constants";
import { HttpError } from "../core/errors";

/**
 * Extended RequestInit with timeout support.
 */
export interface FetchOptions extends RequestInit {
  /** Request timeout in milliseconds. Defaults to 5000ms. */
  timeoutMs?: number;
}

/**
 * Fetches JSON data from a URL with timeout support.
 * A caller-supplied `signal` aborts the request as well as the timeout.
 *
 * @template T - The expected response type
 * @param url - The URL to fetch from
 * @param init - Optional fetch options including timeout
 * @returns Promise resolving to the parsed JSON response
 * @throws {HttpError} When the request fails or returns non-2xx status
 *
 * @example
 * ```typescript
 * const pool = await fetchJson<unknown>("https://midgard.ninerealms.com/v2/pool/BTC.BTC");
 * ```
 */
export async function fetchJson<T>(url: string, init?: FetchOptions): Promise<T> {
  const controller = new AbortController();
  const timeoutMs = init?.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const callerSignal = init?.signal ?? undefined;
  const onCallerAbort = () => controller.abort();
  if (callerSignal?.aborted) controller.abort();
  else callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const resp = await fetch(url, { ...init, signal: controller.signal });

    if (!resp.ok) {
      throw new HttpError(url, resp.status, resp.statusText);
    }

    return (await resp.json()) as T;
  } catch (error) {
    if (error instanceof HttpError) {
      throw error;
    }

    if (error instanceof Error && error.name === "AbortError") {
      const reason = callerSignal?.aborted ? "Request aborted by caller" : `Request timeout after ${timeoutMs}ms`;
      throw new HttpError(url, 408, reason, error);
    }

    throw new HttpError(url, 0, "Network error", error);
  } finally {
    clearTimeout(timeout);
    callerSignal?.removeEventListener("abort", onCallerAbort);
  }
}
