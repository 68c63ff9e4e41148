/**
 * HTTP transport for WFS requests.
 *
 * Every call is bounded by a connect timeout (until response headers arrive)
 * and a read timeout (for the body). Any failure, including non-2xx
 * responses, is retried with linear backoff before the last error is thrown.
 */

import { wfsLogger } from "@/lib/logger";
import { WFS_HEADERS, type WfsSettings } from "./wfs-config";
import { WfsHttpError, WfsTransportError, errorMessage } from "./types";

export type HttpGet = (url: string) => Promise<Uint8Array>;

export interface HttpGetOptions {
  retries?: number;
  /** Backoff unit; attempt n waits n * retryDelayMs before the next try */
  retryDelayMs?: number;
  connectTimeoutMs?: number;
  readTimeoutMs?: number;
  headers?: Record<string, string>;
}

const DEFAULTS: Required<HttpGetOptions> = {
  retries: 3,
  retryDelayMs: 600,
  connectTimeoutMs: 10_000,
  readTimeoutMs: 60_000,
  headers: WFS_HEADERS,
};

// ---------------------------------------------------------------
// Single attempt
// ---------------------------------------------------------------

async function getOnce(url: string, options: Required<HttpGetOptions>): Promise<Uint8Array> {
  const controller = new AbortController();
  let timer = setTimeout(
    () => controller.abort(new Error(`connect timeout after ${options.connectTimeoutMs}ms`)),
    options.connectTimeoutMs,
  );

  try {
    let response: Response;
    try {
      response = await fetch(url, { headers: options.headers, signal: controller.signal });
    } catch (error) {
      throw new WfsTransportError(`Request failed: ${errorMessage(error)}`, url, { cause: error });
    }

    clearTimeout(timer);
    timer = setTimeout(
      () => controller.abort(new Error(`read timeout after ${options.readTimeoutMs}ms`)),
      options.readTimeoutMs,
    );

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new WfsHttpError(response.status, url, text.slice(0, 500));
    }

    try {
      return new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new WfsTransportError(`Reading response failed: ${errorMessage(error)}`, url, {
        cause: error,
      });
    }
  } finally {
    clearTimeout(timer);
  }
}

// ---------------------------------------------------------------
// Retrying GET
// ---------------------------------------------------------------

/**
 * GET `url` and return the raw body.
 * Throws WfsHttpError or WfsTransportError once all attempts have failed.
 */
export async function httpGetBytes(url: string, options: HttpGetOptions = {}): Promise<Uint8Array> {
  const opts: Required<HttpGetOptions> = { ...DEFAULTS, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.retries; attempt++) {
    try {
      return await getOnce(url, opts);
    } catch (error) {
      lastError = error;

      if (attempt < opts.retries) {
        const delay = opts.retryDelayMs * attempt;
        wfsLogger.warn(
          {
            err: errorMessage(error),
            statusCode: error instanceof WfsHttpError ? error.statusCode : undefined,
            attempt,
          },
          `WFS request failed (attempt ${attempt}/${opts.retries}), retrying in ${delay}ms`,
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }

  throw lastError;
}

/** Bind transport options from settings into an HttpGet function. */
export function createHttpGet(settings: Pick<
  WfsSettings,
  "retries" | "retryDelayMs" | "connectTimeoutMs" | "readTimeoutMs"
>): HttpGet {
  return (url) =>
    httpGetBytes(url, {
      retries: settings.retries,
      retryDelayMs: settings.retryDelayMs,
      connectTimeoutMs: settings.connectTimeoutMs,
      readTimeoutMs: settings.readTimeoutMs,
    });
}
