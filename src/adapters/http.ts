/**
 * HTTP adapter
 *
 * JSON GET/POST over the platform fetch with a per-call timeout and an
 * optional caller cancellation signal. Every transport failure, non-2xx status
 * and unparseable body surfaces as a NetworkError tagged with its source.
 */

import { NetworkError, errorMessage } from "../errors.js";
import type { FetchLike, SourceName } from "../types.js";

export const DEFAULT_TIMEOUT_MS = 30_000;
export const USER_AGENT = "vuln-risk/0.1.0";

export interface RequestOptions {
  source: SourceName;
  fetch?: FetchLike;
  timeoutMs?: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
  method?: "GET" | "POST";
  body?: unknown;
}

export async function fetchJson(url: string, options: RequestOptions): Promise<unknown> {
  const doFetch = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const { signal, dispose } = linkSignals(timeoutMs, options.signal);

  let response: Response;
  try {
    response = await doFetch(url, {
      method: options.method ?? "GET",
      headers: {
        Accept: "application/json",
        "User-Agent": USER_AGENT,
        ...(options.body !== undefined ? { "Content-Type": "application/json" } : {}),
        ...options.headers,
      },
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      signal,
    });
  } catch (err) {
    dispose();
    const reason = options.signal?.aborted
      ? "request cancelled"
      : signal.aborted
        ? `timed out after ${timeoutMs}ms`
        : errorMessage(err);
    throw new NetworkError(options.source, `${options.source} request failed: ${reason}`, { cause: err });
  }

  try {
    if (!response.ok) {
      throw new NetworkError(
        options.source,
        `${options.source} request failed: HTTP ${response.status}`,
        { status: response.status },
      );
    }
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new NetworkError(options.source, `${options.source} returned a malformed response`, { cause: err });
    }
  } catch (err) {
    if (err instanceof NetworkError) throw err;
    throw new NetworkError(options.source, `${options.source} request failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    dispose();
  }
}

/**
 * One signal that fires on timeout or when the caller's signal aborts.
 * `dispose` clears the timer and detaches the listener.
 */
export function linkSignals(timeoutMs: number, outer?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error("timeout")), timeoutMs);
  const onAbort = () => controller.abort(outer?.reason);

  if (outer?.aborted) controller.abort(outer.reason);
  else outer?.addEventListener("abort", onAbort, { once: true });

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    },
  };
}
