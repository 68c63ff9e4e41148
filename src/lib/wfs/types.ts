/**
 * Shared types for the WFS fetch core.
 */

import type { Register } from "./wfs-config";

// =============================================================================
// Query
// =============================================================================

export type OutputFormat = "gml" | "geojson";

export interface ParcelQuery {
  register: Register;
  /** Cadastral zone code; matched as a prefix of the parcel reference */
  zoneCode?: string;
  /** Parcel numbers, in request order */
  parcelLabels: string[];
  /** Requested output CRS, e.g. "EPSG:5514" */
  spatialReference?: string;
}

export type FilterDialect = "fes" | "cql";

// =============================================================================
// Results
// =============================================================================

export enum WfsFailureKind {
  INVALID_QUERY = "INVALID_QUERY",
  EMPTY_RESULT = "EMPTY_RESULT",
  SERVER_REJECTED = "SERVER_REJECTED",
  TRANSPORT = "TRANSPORT",
  CANCELLED = "CANCELLED",
  UNEXPECTED = "UNEXPECTED",
}

export interface FetchResult {
  success: boolean;
  message: string;
  /** Raw server responses in startIndex order; all GML or all GeoJSON */
  pages: Uint8Array[];
  firstRequestUrl: string;
  detectedCrs?: string;
  format: OutputFormat;
  failure?: WfsFailureKind;
}

export type BBox = readonly [minX: number, minY: number, maxX: number, maxY: number];

// =============================================================================
// Timing
// =============================================================================

export interface TimingEntry {
  step: string;
  durationMs: number;
}

export type TimingSink = (entry: TimingEntry) => void;

/**
 * Run `fn` and report its duration to `sink`, if one is given.
 */
export async function timed<T>(
  sink: TimingSink | undefined,
  step: string,
  fn: () => Promise<T>,
): Promise<T> {
  if (!sink) return fn();
  const t0 = performance.now();
  try {
    return await fn();
  } finally {
    sink({ step, durationMs: performance.now() - t0 });
  }
}

// =============================================================================
// Errors
// =============================================================================

/** Non-2xx response from the WFS server. */
export class WfsHttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly url: string,
    public readonly body?: string,
  ) {
    super(`HTTP ${statusCode} for ${url}`);
    this.name = "WfsHttpError";
  }
}

/** Network-level failure: DNS, refused connection, reset, timeout. */
export class WfsTransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WfsTransportError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
