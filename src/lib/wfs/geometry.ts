/**
 * Typed GeoJSON geometry, parsed from raw WFS responses, and the
 * bounding-box fold over it.
 */

import { z } from "zod";
import type { BBox } from "./types";

// ---------------------------------------------------------------
// Types
// ---------------------------------------------------------------

export type Position = [number, number, ...number[]];

export type Geometry =
  | { type: "Point"; coordinates: Position }
  | { type: "MultiPoint"; coordinates: Position[] }
  | { type: "LineString"; coordinates: Position[] }
  | { type: "MultiLineString"; coordinates: Position[][] }
  | { type: "Polygon"; coordinates: Position[][] }
  | { type: "MultiPolygon"; coordinates: Position[][][] }
  | { type: "GeometryCollection"; geometries: Geometry[] };

export interface Feature {
  type: "Feature";
  id?: string | number;
  geometry: Geometry | null;
  properties: Record<string, unknown> | null;
}

export interface FeatureCollection {
  type: "FeatureCollection";
  features: Feature[];
}

// ---------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------

const positionSchema: z.ZodType<Position, z.ZodTypeDef, unknown> = z
  .array(z.number())
  .min(2)
  .transform((values): Position => [values[0], values[1], ...values.slice(2)]);

const geometrySchema: z.ZodType<Geometry, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("Point"), coordinates: positionSchema }),
    z.object({ type: z.literal("MultiPoint"), coordinates: z.array(positionSchema) }),
    z.object({ type: z.literal("LineString"), coordinates: z.array(positionSchema) }),
    z.object({ type: z.literal("MultiLineString"), coordinates: z.array(z.array(positionSchema)) }),
    z.object({ type: z.literal("Polygon"), coordinates: z.array(z.array(positionSchema)) }),
    z.object({
      type: z.literal("MultiPolygon"),
      coordinates: z.array(z.array(z.array(positionSchema))),
    }),
    z.object({ type: z.literal("GeometryCollection"), geometries: z.array(geometrySchema) }),
  ]),
);

const featureSchema = z.object({
  type: z.literal("Feature"),
  id: z.union([z.string(), z.number()]).optional(),
  // Unparseable geometry reads as null rather than dropping the feature.
  geometry: geometrySchema.nullable().catch(null),
  properties: z.record(z.unknown()).nullable().catch(null),
});

// ---------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------

const decoder = new TextDecoder("utf-8");

/**
 * Features from a raw GeoJSON body: a FeatureCollection, a single Feature
 * or a bare geometry. Malformed bodies and features yield nothing.
 */
export function parseFeatures(body: Uint8Array | string): Feature[] {
  let json: unknown;
  try {
    json = JSON.parse(typeof body === "string" ? body : decoder.decode(body));
  } catch {
    return [];
  }
  return featuresOf(json);
}

function featuresOf(json: unknown): Feature[] {
  if (typeof json !== "object" || json === null) return [];
  const type: unknown = "type" in json ? json.type : undefined;

  if (type === "FeatureCollection" && "features" in json && Array.isArray(json.features)) {
    return json.features.flatMap((raw: unknown) => {
      const parsed = featureSchema.safeParse(raw);
      return parsed.success ? [parsed.data] : [];
    });
  }

  if (type === "Feature") {
    const parsed = featureSchema.safeParse(json);
    return parsed.success ? [parsed.data] : [];
  }

  const geometry = geometrySchema.safeParse(json);
  return geometry.success
    ? [{ type: "Feature", geometry: geometry.data, properties: null }]
    : [];
}

// ---------------------------------------------------------------
// Bounding box
// ---------------------------------------------------------------

type Extent = [number, number, number, number];

function foldPosition(acc: Extent, [x, y]: Position): Extent {
  return [Math.min(acc[0], x), Math.min(acc[1], y), Math.max(acc[2], x), Math.max(acc[3], y)];
}

function foldPositions(acc: Extent, positions: readonly Position[]): Extent {
  return positions.reduce(foldPosition, acc);
}

function foldGeometry(acc: Extent, geometry: Geometry): Extent {
  switch (geometry.type) {
    case "Point":
      return foldPosition(acc, geometry.coordinates);
    case "MultiPoint":
    case "LineString":
      return foldPositions(acc, geometry.coordinates);
    case "MultiLineString":
    case "Polygon":
      return geometry.coordinates.reduce(foldPositions, acc);
    case "MultiPolygon":
      return geometry.coordinates.reduce(
        (polyAcc, polygon) => polygon.reduce(foldPositions, polyAcc),
        acc,
      );
    case "GeometryCollection":
      return geometry.geometries.reduce(foldGeometry, acc);
  }
}

const EMPTY_EXTENT: Extent = [Infinity, Infinity, -Infinity, -Infinity];

/** Bounding box over all geometries, or null when there are no coordinates. */
export function bboxOfGeometries(geometries: Iterable<Geometry>): BBox | null {
  let acc = EMPTY_EXTENT;
  for (const geometry of geometries) {
    acc = foldGeometry(acc, geometry);
  }
  return acc[0] === Infinity ? null : acc;
}

export function bboxOfFeatures(features: readonly Feature[]): BBox | null {
  return bboxOfGeometries(
    features.flatMap((feature) => (feature.geometry ? [feature.geometry] : [])),
  );
}

/** Bounding box of a raw GeoJSON body. */
export function bboxFromGeoJson(body: Uint8Array | string): BBox | null {
  return bboxOfFeatures(parseFeatures(body));
}

// ---------------------------------------------------------------
// Page merging
// ---------------------------------------------------------------

export interface MergedPages {
  collection: FeatureCollection;
  /** Features across all pages */
  total: number;
  /** Features kept in `collection` */
  kept: number;
}

/**
 * Merge GeoJSON pages into one FeatureCollection for previews, keeping at
 * most `maxFeatures`. `total` counts every feature seen before the cap hit.
 */
export function mergeGeoJsonPages(pages: readonly Uint8Array[], maxFeatures = 8000): MergedPages {
  const features: Feature[] = [];
  let total = 0;

  for (const page of pages) {
    const pageFeatures = parseFeatures(page);
    total += pageFeatures.length;
    if (features.length < maxFeatures) {
      features.push(...pageFeatures.slice(0, maxFeatures - features.length));
    }
    if (features.length >= maxFeatures) break;
  }

  return {
    collection: { type: "FeatureCollection", features },
    total,
    kept: features.length,
  };
}

// ---------------------------------------------------------------
// Map framing
// ---------------------------------------------------------------

export interface MapView {
  lat: number;
  lon: number;
  zoom: number;
}

/** Web-map centre and zoom for a lon/lat bounding box. */
export function viewFromBbox([minX, minY, maxX, maxY]: BBox): MapView {
  const span = Math.max(maxX - minX, maxY - minY, 0.0005);
  const zoom = Math.max(2, Math.min(18, Math.log2(360 / span) + 1));
  return { lat: (minY + maxY) / 2, lon: (minX + maxX) / 2, zoom };
}
