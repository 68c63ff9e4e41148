/**
 * Cache-aside wrapper around fetchPages.
 *
 * Only successful results are stored. Pages are kept base64-encoded in
 * Redis. A failing cache never fails the fetch.
 */

import { z } from 'zod';
import { cacheLogger } from '@/lib/logger';
import { WfsFailureKind, type ParcelQuery } from '@/lib/wfs/types';
import { fetchPages, type FetchPagesOptions, type ParcelFetchResult } from '@/lib/wfs/wfs-client';
import type { CacheCodec } from './index';
import type { ResultCache } from './types';

const storedResultSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  pages: z.array(z.string()),
  firstRequestUrl: z.string(),
  detectedCrs: z.string().optional(),
  format: z.enum(['gml', 'geojson']),
  failure: z.nativeEnum(WfsFailureKind).optional(),
  matchedLabels: z.array(z.string()).optional(),
  diagnostics: z.object({
    srsDropped: z.boolean(),
    dialect: z.enum(['fes', 'cql']),
    requests: z.number(),
  }),
});

export const fetchResultCodec: CacheCodec<ParcelFetchResult> = {
  encode: (result) => ({
    ...result,
    pages: result.pages.map((page) => Buffer.from(page).toString('base64')),
  }),
  decode: (raw) => {
    const parsed = storedResultSchema.safeParse(raw);
    if (!parsed.success) return null;
    return {
      ...parsed.data,
      pages: parsed.data.pages.map((page) => new Uint8Array(Buffer.from(page, 'base64'))),
    };
  },
};

/**
 * Cache key for a query and the options that change the response.
 */
export function fetchCacheKey(
  query: ParcelQuery,
  options: Pick<FetchPagesOptions, 'format' | 'pageSize' | 'maxPages'> = {},
): string {
  return `parcels:${JSON.stringify([
    query.register,
    query.zoneCode ?? '',
    query.parcelLabels,
    query.spatialReference ?? '',
    options.format ?? 'gml',
    options.pageSize ?? null,
    options.maxPages ?? null,
  ])}`;
}

/**
 * fetchPages with a cache in front. A hit returns the stored result
 * unchanged; a miss fetches and stores the result if it succeeded.
 */
export async function cachedFetchPages(
  cache: ResultCache<ParcelFetchResult>,
  query: ParcelQuery,
  options: FetchPagesOptions = {},
): Promise<ParcelFetchResult> {
  const key = fetchCacheKey(query, options);

  try {
    const hit = await cache.get(key);
    if (hit) {
      cacheLogger.debug({ key, insertedAt: hit.insertedAt }, 'Parcel fetch cache hit');
      return hit.value;
    }
  } catch (error) {
    cacheLogger.warn({ err: error, key }, 'Cache lookup failed, fetching uncached');
  }

  const result = await fetchPages(query, options);
  if (result.success) {
    try {
      await cache.set(key, result);
    } catch (error) {
      cacheLogger.warn({ err: error, key }, 'Cache store failed');
    }
  }
  return result;
}
