/**
 * Cheap bounding box of a cadastral zone, for map framing.
 *
 * Three independent tiers, first hit wins:
 *   1. zoning layer, CQL equality, GeoJSON, count=1
 *   2. zoning layer, FES equality, GeoJSON, count=1
 *   3. one parcel of the zone through the regular page fetch
 * Tier errors are swallowed; no result from any tier returns null.
 */

import { wfsLogger } from "@/lib/logger";
import { buildCqlEqualsFilter, buildFesEqualsFilter } from "./filters";
import { createHttpGet, type HttpGet } from "./http";
import { bboxOfFeatures, parseFeatures } from "./geometry";
import { buildGetFeatureUrl } from "./request";
import { type BBox, type FilterDialect, type TimingSink, errorMessage, timed } from "./types";
import { fetchPages } from "./wfs-client";
import { type Register, type WfsSettings, loadWfsSettings } from "./wfs-config";

export interface ZoneBboxOptions {
  settings?: WfsSettings;
  httpGet?: HttpGet;
  /** CRS to ask the server for; default EPSG:4326 for web maps, null for server default */
  srsName?: string | null;
  onTiming?: TimingSink;
}

async function zoningTier(
  dialect: FilterDialect,
  zoneCode: string,
  register: Register,
  settings: WfsSettings,
  httpGet: HttpGet,
  srsName: string | undefined,
): Promise<BBox | null> {
  const config = settings.registers[register];
  const url = buildGetFeatureUrl(config.url, {
    typeName: config.zoningLayer,
    count: 1,
    startIndex: 0,
    filter: {
      dialect,
      expression: dialect === "cql" ? buildCqlEqualsFilter(zoneCode) : buildFesEqualsFilter(zoneCode),
    },
    srsName,
    format: "geojson",
  });

  const body = await httpGet(url);
  return bboxOfFeatures(parseFeatures(body));
}

async function parcelTier(
  zoneCode: string,
  register: Register,
  settings: WfsSettings,
  httpGet: HttpGet,
  srsName: string | undefined,
): Promise<BBox | null> {
  const result = await fetchPages(
    { register, zoneCode, parcelLabels: [], spatialReference: srsName },
    { settings, httpGet, format: "geojson", pageSize: 1, maxPages: 1 },
  );
  if (!result.success || result.pages.length === 0) return null;
  // Coordinates in the server default CRS would frame the map wrongly
  if (srsName && result.diagnostics.srsDropped) {
    wfsLogger.debug({ zoneCode, srsName }, "Parcel layer ignored srsName, discarding bbox");
    return null;
  }
  return bboxOfFeatures(parseFeatures(result.pages[0]));
}

/**
 * Bounding box (minX, minY, maxX, maxY) of a cadastral zone, or null.
 * Never throws.
 */
export async function fetchZoneBbox(
  register: Register,
  zoneCode: string,
  options: ZoneBboxOptions = {},
): Promise<BBox | null> {
  const code = zoneCode.trim();
  if (!code) return null;

  let settings: WfsSettings;
  try {
    settings = options.settings ?? loadWfsSettings();
  } catch (error) {
    wfsLogger.error({ err: errorMessage(error) }, "Invalid WFS settings, no zone bbox");
    return null;
  }

  const httpGet = options.httpGet ?? createHttpGet(settings);
  const srsName = options.srsName === undefined ? "EPSG:4326" : (options.srsName ?? undefined);

  const tiers: Array<[string, () => Promise<BBox | null>]> = [
    ["bbox.zoning-cql", () => zoningTier("cql", code, register, settings, httpGet, srsName)],
    ["bbox.zoning-fes", () => zoningTier("fes", code, register, settings, httpGet, srsName)],
    ["bbox.parcel", () => parcelTier(code, register, settings, httpGet, srsName)],
  ];

  for (const [step, tier] of tiers) {
    try {
      const bbox = await timed(options.onTiming, step, tier);
      if (bbox) {
        wfsLogger.debug({ zoneCode: code, step, bbox }, "Zone bbox resolved");
        return bbox;
      }
    } catch (error) {
      wfsLogger.debug({ zoneCode: code, step, err: errorMessage(error) }, "Zone bbox tier failed");
    }
  }

  wfsLogger.info({ zoneCode: code, register }, "No bbox found for zone");
  return null;
}
