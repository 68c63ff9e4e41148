/**
 * WFS client: pages through cadastral parcels on the INSPIRE WFS.
 *
 * Server-side only (Node.js). Issues GetFeature requests page by page,
 * delegates failure handling to the fallback orchestrator, and returns the
 * raw GML or GeoJSON responses in server order. Never throws.
 */

import { wfsLogger } from "@/lib/logger";
import { buildFesFilter } from "./filters";
import { createHttpGet, type HttpGet } from "./http";
import {
  createFetchState,
  fetchPageWithFallback,
  type FetchState,
  type PageRequestContext,
} from "./orchestrator";
import { MISSING_FILTER_MESSAGE, isQueryValid } from "./query";
import { detectCrs, extractDeclaredCount, extractMatchedCount, hasAnyFeature } from "./response";
import {
  type FetchResult,
  type OutputFormat,
  type ParcelQuery,
  type TimingSink,
  WfsFailureKind,
  errorMessage,
} from "./types";
import { type WfsSettings, loadWfsSettings } from "./wfs-config";

// ---------------------------------------------------------------
// Types
// ---------------------------------------------------------------

export interface FetchPagesOptions {
  /** Defaults to loadWfsSettings() */
  settings?: WfsSettings;
  /** Transport override; defaults to httpGetBytes with settings */
  httpGet?: HttpGet;
  pageSize?: number;
  /** Default "gml" */
  format?: OutputFormat;
  /** Stop after this many pages */
  maxPages?: number;
  /**
   * Fetch the pages after the first in parallel batches of this size, once
   * the first page reports numberMatched. 1 (default) is strictly sequential.
   */
  concurrency?: number;
  /** Checked between pages */
  signal?: AbortSignal;
  onTiming?: TimingSink;
}

export interface FetchDiagnostics {
  srsDropped: boolean;
  dialect: FetchState["dialect"];
  /** HTTP requests issued, not counting transport retries */
  requests: number;
}

export type ParcelFetchResult = FetchResult & {
  diagnostics: FetchDiagnostics;
  /** Labels that returned features, when split-by-one was used */
  matchedLabels?: string[];
};

export const EMPTY_RESULT_MESSAGE = "Server returned 0 features for this filter.";

// ---------------------------------------------------------------
// Core
// ---------------------------------------------------------------

/**
 * Fetch every page of parcels matching `query`.
 *
 * Paging stops when a page declares 0 features or has none, when a page
 * declares fewer than `pageSize`, when a page without count metadata is
 * implausibly small, or when startIndex passes the safety ceiling.
 */
export async function fetchPages(
  query: ParcelQuery,
  options: FetchPagesOptions = {},
): Promise<ParcelFetchResult> {
  const format = options.format ?? "gml";
  const state = createFetchState();
  let requests = 0;
  let firstRequestUrl = "";

  const finish = (
    fields: Pick<FetchResult, "success" | "message" | "pages"> &
      Partial<Pick<ParcelFetchResult, "failure" | "matchedLabels">>,
  ): ParcelFetchResult => ({
    ...fields,
    firstRequestUrl,
    format,
    detectedCrs: fields.pages.length > 0 ? detectCrs(fields.pages[0]) : undefined,
    diagnostics: { srsDropped: state.srsDropped, dialect: state.dialect, requests },
  });

  const fail = (failure: WfsFailureKind, message: string, pages: Uint8Array[] = []) =>
    finish({ success: false, message, pages, failure });

  if (!isQueryValid(query)) {
    return fail(WfsFailureKind.INVALID_QUERY, MISSING_FILTER_MESSAGE);
  }
  if (!buildFesFilter(query.zoneCode, query.parcelLabels)) {
    return fail(WfsFailureKind.INVALID_QUERY, "Invalid filter: neither zone nor parcels given.");
  }

  try {
    const settings = options.settings ?? loadWfsSettings();
    const pageSize = options.pageSize ?? settings.pageSize;
    const concurrency = Math.max(1, options.concurrency ?? 1);

    const ctx: PageRequestContext = {
      query,
      register: settings.registers[query.register],
      httpGet: options.httpGet ?? createHttpGet(settings),
      format,
      pageSize,
      splitPageSize: settings.splitPageSize,
      onTiming: options.onTiming,
      onRequest: (url) => {
        requests++;
        if (!firstRequestUrl) firstRequestUrl = url;
      },
    };

    const pages: Uint8Array[] = [];
    let startIndex = 0;

    wfsLogger.info(
      { register: query.register, zoneCode: query.zoneCode, labels: query.parcelLabels.length, format },
      "Fetching parcel pages",
    );

    for (;;) {
      if (options.signal?.aborted) {
        return fail(WfsFailureKind.CANCELLED, `Cancelled after ${pages.length} page(s).`, pages);
      }

      const outcome = await fetchPageWithFallback(ctx, state, startIndex, {
        havePages: pages.length > 0,
      });

      if (outcome.kind === "failure") {
        return fail(outcome.failure, outcome.message);
      }
      if (outcome.kind === "split") {
        return finish({
          success: true,
          message: `Fetched ${outcome.pages.length} page(s) (split-by-one)`,
          pages: outcome.pages,
          matchedLabels: outcome.labels,
        });
      }
      if (outcome.kind === "end") break;

      const body = outcome.body;
      const declared = extractDeclaredCount(body);
      if (declared === 0 || !hasAnyFeature(body)) break;

      pages.push(body);
      if (options.maxPages !== undefined && pages.length >= options.maxPages) break;

      if (declared !== null) {
        if (declared < pageSize) break;
        startIndex += declared;
      } else {
        if (body.length < settings.minPlausibleBytes) break;
        startIndex += pageSize;
      }

      if (startIndex > settings.maxStartIndex) {
        wfsLogger.warn({ startIndex, limit: settings.maxStartIndex }, "Pagination safety ceiling reached");
        break;
      }

      if (concurrency > 1 && pages.length === 1) {
        const total = extractMatchedCount(body);
        if (total !== null) {
          const rest = await fetchRemainingPages(ctx, state, {
            total,
            startIndex,
            pageSize,
            concurrency,
            maxStartIndex: settings.maxStartIndex,
            maxPages: options.maxPages === undefined ? undefined : options.maxPages - 1,
            signal: options.signal,
          });
          if (!rest.ok) {
            if (rest.failure !== WfsFailureKind.CANCELLED) return fail(rest.failure, rest.message);
            const partial = [...pages, ...rest.pages];
            return fail(WfsFailureKind.CANCELLED, `Cancelled after ${partial.length} page(s).`, partial);
          }
          pages.push(...rest.pages);
          break;
        }
      }
    }

    if (pages.length === 0) {
      return fail(WfsFailureKind.EMPTY_RESULT, EMPTY_RESULT_MESSAGE);
    }

    const notes = [
      ...(state.srsDropped ? ["srsName dropped"] : []),
      ...(state.dialect === "cql" ? ["CQL fallback"] : []),
    ];
    const message = notes.length
      ? `Fetched ${pages.length} page(s) (${notes.join(", ")})`
      : `Fetched ${pages.length} page(s)`;

    wfsLogger.info({ pages: pages.length, requests }, "Parcel pages fetched");
    return finish({ success: true, message, pages });
  } catch (error) {
    wfsLogger.error({ err: errorMessage(error) }, "Parcel fetch aborted by unexpected error");
    return fail(WfsFailureKind.UNEXPECTED, `Error: ${errorMessage(error)}`);
  }
}

// ---------------------------------------------------------------
// Parallel fan-out
// ---------------------------------------------------------------

interface FanOutPlan {
  total: number;
  startIndex: number;
  pageSize: number;
  concurrency: number;
  maxStartIndex: number;
  maxPages?: number;
  signal?: AbortSignal;
}

type FanOutResult =
  | { ok: true; pages: Uint8Array[] }
  /** `pages` holds the batches completed before the failure */
  | { ok: false; failure: WfsFailureKind; message: string; pages: Uint8Array[] };

/**
 * Fetch the pages from `startIndex` up to `total` in parallel batches.
 * State is frozen so every request carries the same parameter set; pages
 * come back in startIndex order whatever the completion order.
 */
async function fetchRemainingPages(
  ctx: PageRequestContext,
  state: FetchState,
  plan: FanOutPlan,
): Promise<FanOutResult> {
  const offsets: number[] = [];
  for (
    let offset = plan.startIndex;
    offset < plan.total && offset <= plan.maxStartIndex;
    offset += plan.pageSize
  ) {
    if (plan.maxPages !== undefined && offsets.length >= plan.maxPages) break;
    offsets.push(offset);
  }

  wfsLogger.debug({ total: plan.total, pages: offsets.length }, "Fetching remaining pages in parallel");

  const bodies: Array<Uint8Array | null> = [];
  const collected = () => bodies.filter((body): body is Uint8Array => body !== null);

  for (let i = 0; i < offsets.length; i += plan.concurrency) {
    if (plan.signal?.aborted) {
      return {
        ok: false,
        failure: WfsFailureKind.CANCELLED,
        message: "Cancelled during parallel fetch.",
        pages: collected(),
      };
    }

    const batch = offsets.slice(i, i + plan.concurrency);
    const outcomes = await Promise.all(
      batch.map((offset) =>
        fetchPageWithFallback(ctx, { ...state }, offset, { havePages: true, frozen: true }),
      ),
    );

    for (const outcome of outcomes) {
      if (outcome.kind === "failure") {
        return { ok: false, failure: outcome.failure, message: outcome.message, pages: collected() };
      }
      bodies.push(outcome.kind === "page" && hasAnyFeature(outcome.body) ? outcome.body : null);
    }
  }

  return { ok: true, pages: collected() };
}
