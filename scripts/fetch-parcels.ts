/**
 * Fetch cadastral parcels from the WFS and write them as a GIS file.
 *
 * Usage:
 *   npm run fetch -- --zone "Nitra" --parcels "1234/1, 1234/2" --format gpkg
 *   npm run fetch -- --register E --zone 848131 --format gml-zip --out nitra.zip
 *   npm run fetch -- --zone 804096 --bbox
 *
 * Logs go to stderr (LOG_LEVEL), the summary to stdout.
 */

import { writeFile } from "fs/promises";
import { Command } from "commander";
import { z } from "zod";
import { type ResultCache, createResultCache } from "@/lib/cache";
import { cachedFetchPages, fetchResultCodec } from "@/lib/cache/parcels";
import { EXPORT_FORMATS, Ogr2OgrConverter, exportParcels } from "@/lib/export";
import { cliLogger } from "@/lib/logger";
import { fetchZoneBbox } from "@/lib/wfs/bbox";
import { viewFromBbox } from "@/lib/wfs/geometry";
import { createQuery } from "@/lib/wfs/query";
import type { ParcelQuery } from "@/lib/wfs/types";
import { type FetchPagesOptions, type ParcelFetchResult, fetchPages } from "@/lib/wfs/wfs-client";
import { WFS_CRS_CHOICES, loadWfsSettings } from "@/lib/wfs/wfs-config";
import { DEFAULT_ZONE_INDEX_URL, loadZoneIndex } from "@/lib/zones/zone-index";

interface FetchCliOptions {
  readonly register: string;
  readonly zone?: string;
  readonly parcels?: string;
  readonly srs?: string;
  readonly format: string;
  readonly out?: string;
  readonly bbox?: boolean;
  readonly concurrency: string;
  readonly cache: boolean;
}

const formatSchema = z.enum(EXPORT_FORMATS);
const concurrencySchema = z.coerce.number().int().min(1).max(8);

async function resolveZone(zone: string | undefined, indexPath: string | undefined): Promise<string | undefined> {
  if (!zone?.trim()) return undefined;

  const index = await loadZoneIndex(indexPath ?? DEFAULT_ZONE_INDEX_URL);
  const { code, candidates } = index.resolve(zone);
  if (!code) {
    throw new Error(`Unknown cadastral zone "${zone}". Use the numeric zone code.`);
  }
  if (candidates.length > 1) {
    cliLogger.info(
      { chosen: candidates[0], others: candidates.slice(1).map((c) => `${c.name} (${c.code})`) },
      "Zone name is ambiguous, using the closest match",
    );
  }
  return code;
}

async function fetchWithCache(
  cache: ResultCache<ParcelFetchResult> | null,
  query: ParcelQuery,
  options: FetchPagesOptions,
): Promise<ParcelFetchResult> {
  try {
    return cache ? await cachedFetchPages(cache, query, options) : await fetchPages(query, options);
  } finally {
    await cache?.close();
  }
}

async function run(options: FetchCliOptions): Promise<number> {
  const settings = loadWfsSettings();

  const format = formatSchema.safeParse(options.format);
  if (!format.success) {
    console.error(`Unknown format "${options.format}". Choose one of: ${EXPORT_FORMATS.join(", ")}`);
    return 2;
  }
  const concurrency = concurrencySchema.safeParse(options.concurrency);
  if (!concurrency.success) {
    console.error("--concurrency must be a whole number between 1 and 8");
    return 2;
  }

  const zoneCode = await resolveZone(options.zone, settings.zoneIndexPath);
  const parsed = createQuery({
    register: options.register,
    zoneCode,
    parcels: options.parcels,
    spatialReference: options.srs === "auto" ? undefined : options.srs,
  });
  if (!parsed.ok) {
    console.error(parsed.message);
    return 2;
  }
  const query = parsed.query;

  if (options.bbox) {
    if (!query.zoneCode) {
      console.error("--bbox needs --zone");
      return 2;
    }
    const bbox = await fetchZoneBbox(query.register, query.zoneCode, { settings });
    if (!bbox) {
      console.error(`No bounding box found for zone ${query.zoneCode}`);
      return 1;
    }
    console.log(JSON.stringify({ zoneCode: query.zoneCode, bbox, view: viewFromBbox(bbox) }));
    return 0;
  }

  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  const cache = options.cache
    ? createResultCache({
        redisUrl: settings.redisUrl,
        ttlSeconds: settings.cacheTtlSeconds,
        codec: fetchResultCodec,
      })
    : null;

  // DXF is fetched as GeoJSON so the built-in writer can take over without GDAL
  const fetchOptions: FetchPagesOptions = {
    settings,
    format: format.data === "geojson" || format.data === "dxf" ? "geojson" : "gml",
    concurrency: concurrency.data,
    signal: controller.signal,
    onTiming: ({ step, durationMs }) =>
      cliLogger.debug({ step, durationMs: Math.round(durationMs) }, "timing"),
  };

  const result = await fetchWithCache(cache, query, fetchOptions).finally(() => {
    process.off("SIGINT", onSigint);
  });

  if (!result.success) {
    console.error(`${result.failure ?? "FAILED"}: ${result.message}`);
    console.error(`First request: ${result.firstRequestUrl}`);
    return 1;
  }
  console.log(result.message);
  if (result.detectedCrs) console.log(`CRS: ${result.detectedCrs}`);

  const exported = await exportParcels(result, format.data, new Ogr2OgrConverter(), {
    baseName: `parcels_${query.zoneCode ?? query.register}`,
  });
  if (!exported.success) {
    console.error(`${exported.failure}: ${exported.message}`);
    return 1;
  }

  const target = options.out ?? exported.fileName;
  await writeFile(target, exported.data);
  console.log(`Wrote ${target} (${exported.data.length} bytes, ${exported.producedBy})`);
  return 0;
}

const program = new Command()
  .name("cadastre-wfs")
  .description("Fetch cadastral parcels from the INSPIRE WFS and export them")
  .option("-r, --register <register>", "Register: C (parcels) or E (original ownership)", "C")
  .option("-z, --zone <zone>", "Cadastral zone code or name")
  .option("-p, --parcels <list>", "Parcel numbers separated by commas, semicolons or spaces")
  .option(
    "--srs <crs>",
    `Output CRS: ${Object.values(WFS_CRS_CHOICES).filter((code) => code !== null).join(", ")} or "auto" (server default)`,
  )
  .option("-f, --format <format>", `Output: ${EXPORT_FORMATS.join("|")}`, "gml-zip")
  .option("-o, --out <file>", "Output file (default: derived from the zone)")
  .option("--bbox", "Print the zone bounding box and map view instead of fetching parcels")
  .option("--concurrency <n>", "Parallel page requests after the first page", "1")
  .option("--no-cache", "Bypass the result cache")
  .action(async (options: FetchCliOptions) => {
    process.exitCode = await run(options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  cliLogger.error({ err: error }, "Fetch failed");
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
