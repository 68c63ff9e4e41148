/**
 * Fallback state machine for a single page request.
 *
 * On failure the checks run in a fixed order and exactly one transition
 * fires:
 *   1. 400 or no status, with srsName still sent  -> drop srsName, retry
 *   2. 400 after pages were collected            -> end of pagination
 *   3. 400 with parcel labels (FES)              -> one request per label
 *   4. any other HTTP error                      -> retry once as CQL
 * Transport errors past step 1 and a failed CQL retry are terminal.
 */

import { wfsLogger } from "@/lib/logger";
import { buildCqlFilter, buildFesFilter } from "./filters";
import type { HttpGet } from "./http";
import { buildGetFeatureUrl } from "./request";
import { hasAnyFeature } from "./response";
import type { RegisterConfig } from "./wfs-config";
import {
  type FilterDialect,
  type OutputFormat,
  type ParcelQuery,
  type TimingSink,
  WfsFailureKind,
  WfsHttpError,
  WfsTransportError,
  errorMessage,
  timed,
} from "./types";

// ---------------------------------------------------------------
// Types
// ---------------------------------------------------------------

/** Query-scoped state; survives across pages of one fetch. */
export interface FetchState {
  srsDropped: boolean;
  /** Switches to "cql" for the rest of the query once CQL succeeds */
  dialect: FilterDialect;
}

export interface PageRequestContext {
  query: ParcelQuery;
  register: RegisterConfig;
  httpGet: HttpGet;
  format: OutputFormat;
  pageSize: number;
  splitPageSize: number;
  onTiming?: TimingSink;
  /** Called with every URL before it is requested */
  onRequest?: (url: string) => void;
}

export interface PageRequestOptions {
  /** Pages were already collected for this query */
  havePages: boolean;
  /**
   * No state transitions: used for parallel page requests, where a
   * mid-flight SRS drop or dialect switch would mix parameter sets.
   */
  frozen?: boolean;
}

export type PageOutcome =
  | { kind: "page"; body: Uint8Array }
  | { kind: "end" }
  | { kind: "split"; pages: Uint8Array[]; labels: string[] }
  | { kind: "failure"; failure: WfsFailureKind; message: string };

// ---------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------

export function createFetchState(): FetchState {
  return { srsDropped: false, dialect: "fes" };
}

function labelsOf(ctx: PageRequestContext): string[] {
  return ctx.query.parcelLabels.filter((label) => label.length > 0);
}

function sendsSrs(ctx: PageRequestContext, state: FetchState): boolean {
  return Boolean(ctx.query.spatialReference) && !state.srsDropped;
}

function filterFor(ctx: PageRequestContext, dialect: FilterDialect, labels: readonly string[]) {
  const { zoneCode } = ctx.query;
  return {
    dialect,
    expression: dialect === "fes" ? buildFesFilter(zoneCode, labels) : buildCqlFilter(zoneCode, labels),
  };
}

function pageUrl(
  ctx: PageRequestContext,
  state: FetchState,
  dialect: FilterDialect,
  startIndex: number,
): string {
  return buildGetFeatureUrl(ctx.register.url, {
    typeName: ctx.register.parcelLayer,
    count: ctx.pageSize,
    startIndex,
    filter: filterFor(ctx, dialect, ctx.query.parcelLabels),
    srsName: sendsSrs(ctx, state) ? ctx.query.spatialReference : undefined,
    format: ctx.format,
  });
}

async function get(ctx: PageRequestContext, step: string, url: string): Promise<Uint8Array> {
  ctx.onRequest?.(url);
  return timed(ctx.onTiming, step, () => ctx.httpGet(url));
}

function failureKindOf(error: unknown): WfsFailureKind {
  if (error instanceof WfsHttpError) return WfsFailureKind.SERVER_REJECTED;
  if (error instanceof WfsTransportError) return WfsFailureKind.TRANSPORT;
  return WfsFailureKind.UNEXPECTED;
}

function failure(kind: WfsFailureKind, message: string): PageOutcome {
  return { kind: "failure", failure: kind, message };
}

// ---------------------------------------------------------------
// Fallback tiers
// ---------------------------------------------------------------

/**
 * One request per parcel label, each at startIndex 0. Keeps the responses
 * that contain features; individual failures are skipped.
 */
async function splitByOne(
  ctx: PageRequestContext,
  state: FetchState,
): Promise<{ pages: Uint8Array[]; labels: string[] }> {
  const pages: Uint8Array[] = [];
  const labels: string[] = [];

  for (const label of labelsOf(ctx)) {
    const url = buildGetFeatureUrl(ctx.register.url, {
      typeName: ctx.register.parcelLayer,
      count: ctx.splitPageSize,
      startIndex: 0,
      filter: filterFor(ctx, "fes", [label]),
      srsName: sendsSrs(ctx, state) ? ctx.query.spatialReference : undefined,
      format: ctx.format,
    });

    try {
      const body = await get(ctx, "wfs.split", url);
      if (hasAnyFeature(body)) {
        pages.push(body);
        labels.push(label);
      }
    } catch (error) {
      wfsLogger.debug({ label, err: errorMessage(error) }, "Single-label request failed, skipping");
    }
  }

  return { pages, labels };
}

async function cqlFallback(
  ctx: PageRequestContext,
  state: FetchState,
  startIndex: number,
  cause: Error,
): Promise<PageOutcome> {
  const cql = buildCqlFilter(ctx.query.zoneCode, ctx.query.parcelLabels);
  if (!cql) {
    return failure(failureKindOf(cause), `HTTP error: ${cause.message}`);
  }

  wfsLogger.info({ startIndex, err: cause.message }, "FES request rejected, retrying with CQL_FILTER");

  try {
    const body = await get(ctx, "wfs.cql", pageUrl(ctx, state, "cql", startIndex));
    state.dialect = "cql";
    return { kind: "page", body };
  } catch (error) {
    wfsLogger.error({ startIndex, err: errorMessage(error) }, "CQL fallback failed");
    return failure(
      failureKindOf(error),
      `HTTP error: ${cause.message}\nCQL fallback failed: ${errorMessage(error)}`,
    );
  }
}

// ---------------------------------------------------------------
// Core
// ---------------------------------------------------------------

/**
 * Fetch the page at `startIndex`, walking the fallback tiers on failure.
 * Mutates `state` (SRS drop, dialect switch) unless `frozen` is set.
 * Never throws.
 */
export async function fetchPageWithFallback(
  ctx: PageRequestContext,
  state: FetchState,
  startIndex: number,
  options: PageRequestOptions,
): Promise<PageOutcome> {
  for (;;) {
    const withSrs = sendsSrs(ctx, state);
    const url = pageUrl(ctx, state, state.dialect, startIndex);

    try {
      const body = await get(ctx, "wfs.page", url);
      return { kind: "page", body };
    } catch (error) {
      if (!(error instanceof WfsHttpError) && !(error instanceof WfsTransportError)) {
        wfsLogger.error({ url, err: errorMessage(error) }, "Unexpected error during WFS request");
        return failure(WfsFailureKind.UNEXPECTED, `Error: ${errorMessage(error)}`);
      }

      const statusCode = error instanceof WfsHttpError ? error.statusCode : undefined;
      const rejected = statusCode === 400;

      if (options.frozen) {
        if (rejected && options.havePages) return { kind: "end" };
        return failure(failureKindOf(error), `HTTP error: ${error.message}`);
      }

      if ((rejected || statusCode === undefined) && withSrs) {
        wfsLogger.info(
          { statusCode, srsName: ctx.query.spatialReference, startIndex },
          "Request rejected with srsName, dropping it for the rest of the query",
        );
        state.srsDropped = true;
        continue;
      }

      if (rejected && options.havePages) {
        wfsLogger.debug({ startIndex }, "HTTP 400 after collected pages, treating as end of data");
        return { kind: "end" };
      }

      if (statusCode === undefined) {
        wfsLogger.error({ url, err: error.message }, "WFS transport failure");
        return failure(WfsFailureKind.TRANSPORT, `Transport error: ${error.message}`);
      }

      if (rejected && state.dialect === "fes" && labelsOf(ctx).length > 0) {
        wfsLogger.info(
          { labels: labelsOf(ctx).length },
          "OR filter rejected, querying parcel labels one by one",
        );
        const split = await splitByOne(ctx, state);
        if (split.pages.length > 0) {
          return { kind: "split", pages: split.pages, labels: split.labels };
        }
      }

      if (state.dialect === "cql") {
        return failure(WfsFailureKind.SERVER_REJECTED, `HTTP error: ${error.message}`);
      }

      return cqlFallback(ctx, state, startIndex, error);
    }
  }
}
