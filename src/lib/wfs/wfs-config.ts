/**
 * Configuration for the Slovak INSPIRE cadastral WFS (skgeodesy GeoServer).
 *
 * Two registers are published as separate GeoServer workspaces: the primary
 * "C" register (current parcels) and the secondary "E" register (parcels of
 * the older land-ownership register, "UO" layers).
 */

import { z } from "zod";

// ---------------------------------------------------------------
// Registers
// ---------------------------------------------------------------

export type Register = "C" | "E";

export const REGISTERS = ["C", "E"] as const satisfies readonly Register[];

export interface RegisterConfig {
  /** Internal key */
  key: Register;
  /** Human-readable label */
  label: string;
  /** WFS/WMS base URL (GeoServer OWS endpoint) */
  url: string;
  /** Parcel feature type */
  parcelLayer: string;
  /** Cadastral zone (district) feature type */
  zoningLayer: string;
}

const DEFAULT_C_BASE = "https://inspirews.skgeodesy.sk/geoserver/cp/ows";
const DEFAULT_E_BASE = "https://inspirews.skgeodesy.sk/geoserver/cp_uo/ows";

/** Property holding the full parcel reference (zone code is its prefix). */
export const REFERENCE_PROPERTY = "nationalCadastralReference";

/** Property holding the human-readable parcel number. */
export const LABEL_PROPERTY = "label";

export const WFS_VERSION = "2.0.0";

export const GEOJSON_OUTPUT_FORMAT = "application/json";

export const WFS_HEADERS = {
  "User-Agent": "cadastre-wfs-export/0.1 (+WFS 2.0 client)",
  Accept: "application/xml,*/*;q=0.5",
} as const;

/**
 * CRS options offered for the `srsName` parameter.
 * `null` leaves the projection to the server default.
 */
export const WFS_CRS_CHOICES: Record<string, string | null> = {
  "auto (server default)": null,
  "EPSG:5514 (S-JTSK / Krovak EN)": "EPSG:5514",
  "EPSG:4258 (ETRS89)": "EPSG:4258",
  "EPSG:4326 (WGS84)": "EPSG:4326",
};

// ---------------------------------------------------------------
// Settings (environment overrides)
// ---------------------------------------------------------------

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const settingsSchema = z.object({
  CP_WFS_BASE: z.string().url().default(DEFAULT_C_BASE),
  CP_UO_WFS_BASE: z.string().url().default(DEFAULT_E_BASE),
  WFS_PAGE_SIZE: intFromEnv(1000, 1),
  WFS_SPLIT_PAGE_SIZE: intFromEnv(1000, 1),
  WFS_RETRIES: intFromEnv(3, 1),
  WFS_RETRY_DELAY_MS: intFromEnv(600),
  WFS_CONNECT_TIMEOUT_MS: intFromEnv(10_000, 1),
  WFS_READ_TIMEOUT_MS: intFromEnv(60_000, 1),
  WFS_MAX_START_INDEX: intFromEnv(500_000, 1),
  WFS_MIN_PLAUSIBLE_BYTES: intFromEnv(10_000),
  WFS_CACHE_TTL_SECONDS: intFromEnv(3600),
  REDIS_URL: z.string().url().optional(),
  ZONE_INDEX_PATH: z.string().min(1).optional(),
});

export interface WfsSettings {
  registers: Record<Register, RegisterConfig>;
  pageSize: number;
  splitPageSize: number;
  retries: number;
  retryDelayMs: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  /** Runaway-pagination guard: stop once startIndex exceeds this. */
  maxStartIndex: number;
  /** Bodies smaller than this without count metadata are treated as the last page. */
  minPlausibleBytes: number;
  cacheTtlSeconds: number;
  redisUrl?: string;
  zoneIndexPath?: string;
}

/**
 * Read settings from the environment. Empty strings count as unset.
 * Throws a ZodError naming the offending variable on invalid input.
 */
export function loadWfsSettings(
  env: Record<string, string | undefined> = process.env,
): WfsSettings {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = settingsSchema.parse(cleaned);

  return {
    registers: {
      C: {
        key: "C",
        label: "Register C (parcels)",
        url: parsed.CP_WFS_BASE,
        parcelLayer: "cp:CP.CadastralParcel",
        zoningLayer: "cp:CP.CadastralZoning",
      },
      E: {
        key: "E",
        label: "Register E (land-ownership parcels)",
        url: parsed.CP_UO_WFS_BASE,
        parcelLayer: "cp_uo:CP.CadastralParcelUO",
        zoningLayer: "cp_uo:CP.CadastralZoningUO",
      },
    },
    pageSize: parsed.WFS_PAGE_SIZE,
    splitPageSize: parsed.WFS_SPLIT_PAGE_SIZE,
    retries: parsed.WFS_RETRIES,
    retryDelayMs: parsed.WFS_RETRY_DELAY_MS,
    connectTimeoutMs: parsed.WFS_CONNECT_TIMEOUT_MS,
    readTimeoutMs: parsed.WFS_READ_TIMEOUT_MS,
    maxStartIndex: parsed.WFS_MAX_START_INDEX,
    minPlausibleBytes: parsed.WFS_MIN_PLAUSIBLE_BYTES,
    cacheTtlSeconds: parsed.WFS_CACHE_TTL_SECONDS,
    redisUrl: parsed.REDIS_URL,
    zoneIndexPath: parsed.ZONE_INDEX_PATH,
  };
}

/** WMS endpoint and layer for map previews of a register. */
export function wmsEndpointAndLayer(
  register: Register,
  settings: WfsSettings = loadWfsSettings(),
): { url: string; layer: string } {
  const config = settings.registers[register];
  return { url: config.url, layer: config.parcelLayer };
}
