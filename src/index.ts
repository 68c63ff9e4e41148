/**
 * Public API of the cadastral WFS fetch and export library.
 */

// Query and fetch
export { createQuery, parseParcelLabels, isQueryValid, MISSING_FILTER_MESSAGE } from "./lib/wfs/query";
export type { ParcelQueryInput, QueryParseResult } from "./lib/wfs/query";
export { fetchPages, EMPTY_RESULT_MESSAGE } from "./lib/wfs/wfs-client";
export type { FetchPagesOptions, FetchDiagnostics, ParcelFetchResult } from "./lib/wfs/wfs-client";
export { fetchZoneBbox } from "./lib/wfs/bbox";
export type { ZoneBboxOptions } from "./lib/wfs/bbox";

// Building blocks
export { buildFesFilter, buildCqlFilter, buildFesEqualsFilter, buildCqlEqualsFilter } from "./lib/wfs/filters";
export { httpGetBytes, createHttpGet } from "./lib/wfs/http";
export type { HttpGet, HttpGetOptions } from "./lib/wfs/http";
export { hasAnyFeature, extractDeclaredCount, extractMatchedCount, detectCrs, normalizeCrs } from "./lib/wfs/response";
export { buildGetFeatureUrl } from "./lib/wfs/request";
export { fetchPageWithFallback, createFetchState } from "./lib/wfs/orchestrator";
export type { FetchState, PageOutcome, PageRequestContext } from "./lib/wfs/orchestrator";
export {
  parseFeatures,
  bboxOfFeatures,
  bboxFromGeoJson,
  mergeGeoJsonPages,
  viewFromBbox,
} from "./lib/wfs/geometry";
export type { Feature, FeatureCollection, Geometry, Position, MapView, MergedPages } from "./lib/wfs/geometry";
export {
  WfsFailureKind,
  WfsHttpError,
  WfsTransportError,
} from "./lib/wfs/types";
export type {
  BBox,
  FetchResult,
  FilterDialect,
  OutputFormat,
  ParcelQuery,
  TimingEntry,
  TimingSink,
} from "./lib/wfs/types";

// Configuration
export {
  loadWfsSettings,
  wmsEndpointAndLayer,
  REGISTERS,
  WFS_CRS_CHOICES,
} from "./lib/wfs/wfs-config";
export type { Register, RegisterConfig, WfsSettings } from "./lib/wfs/wfs-config";

// Cache
export { MemoryCache, RedisCache, createResultCache, getRedisOptions } from "./lib/cache";
export type { CacheCodec, CacheEntry, ResultCache } from "./lib/cache";
export { cachedFetchPages, fetchCacheKey, fetchResultCodec } from "./lib/cache/parcels";

// Zones
export { ZoneIndex, loadZoneIndex, parseZoneList, normalizeZoneName } from "./lib/zones/zone-index";
export type { Zone, ZoneLookup } from "./lib/zones/zone-index";

// Export
export * from "./lib/export";
