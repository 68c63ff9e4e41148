/**
 * Format-agnostic inspection of raw WFS responses.
 *
 * Bodies are either GML 3.2 FeatureCollections or GeoJSON. None of these
 * helpers throw: a malformed or truncated body reads as "no features".
 */

import { XMLParser } from "fast-xml-parser";

const decoder = new TextDecoder("utf-8");

// Members stay unparsed; only the collection element and its attributes matter here.
const collectionParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  removeNSPrefix: true,
  stopNodes: ["*.member", "*.featureMember", "*.featureMembers"],
  isArray: (name) => ["member", "featureMember"].includes(name),
});

const MEMBER_MARKERS = ["featureMember", ":member", "<member"];

function toText(body: Uint8Array): string {
  return decoder.decode(body);
}

function looksLikeXml(text: string): boolean {
  return text.trimStart().startsWith("<");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function parseCollection(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = collectionParser.parse(text);
    if (!isRecord(parsed)) return null;
    const root = parsed.FeatureCollection;
    return isRecord(root) ? root : null;
  } catch {
    return null;
  }
}

function toCount(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
  if (typeof value === "string" && /^\d+$/.test(value.trim())) return parseInt(value, 10);
  return null;
}

// ---------------------------------------------------------------
// Feature presence
// ---------------------------------------------------------------

/**
 * True when the body holds at least one feature: a GML member element, a
 * non-empty GeoJSON `features` array, or a bare GeoJSON Feature.
 */
export function hasAnyFeature(body: Uint8Array): boolean {
  if (body.length === 0) return false;
  const text = toText(body);

  if (looksLikeXml(text)) {
    return MEMBER_MARKERS.some((marker) => text.includes(marker));
  }

  const json = parseJson(text);
  if (!json) return false;
  if (json.type === "Feature") return true;
  return Array.isArray(json.features) && json.features.length > 0;
}

// ---------------------------------------------------------------
// Count metadata
// ---------------------------------------------------------------

/**
 * Number of features the server says this page holds: the GML
 * `numberReturned` attribute, or the GeoJSON `features` length.
 */
export function extractDeclaredCount(body: Uint8Array): number | null {
  if (body.length === 0) return null;
  const text = toText(body);

  if (looksLikeXml(text)) {
    const collection = parseCollection(text);
    return collection ? toCount(collection["@_numberReturned"]) : null;
  }

  const json = parseJson(text);
  if (!json || !Array.isArray(json.features)) return null;
  return json.features.length;
}

/**
 * Total number of matching features, when the server reports it
 * (`numberMatched` in GML and GeoServer GeoJSON, `totalFeatures` in older
 * GeoServer GeoJSON). "unknown" and absent values read as null.
 */
export function extractMatchedCount(body: Uint8Array): number | null {
  if (body.length === 0) return null;
  const text = toText(body);

  if (looksLikeXml(text)) {
    const collection = parseCollection(text);
    return collection ? toCount(collection["@_numberMatched"]) : null;
  }

  const json = parseJson(text);
  if (!json) return null;
  return toCount(json.numberMatched) ?? toCount(json.totalFeatures);
}

// ---------------------------------------------------------------
// CRS
// ---------------------------------------------------------------

/** Normalize "urn:ogc:def:crs:EPSG::5514", "http://www.opengis.net/def/crs/EPSG/0/5514" etc. */
export function normalizeCrs(name: string): string {
  const match = /EPSG(?::+|\/\d+\/|\.xml#)?(\d+)\s*$/i.exec(name.trim());
  return match ? `EPSG:${match[1]}` : name.trim();
}

/**
 * CRS the server used for the geometries in `body`, if it says.
 * GML: first `srsName` attribute. GeoJSON: `crs.properties.name`.
 */
export function detectCrs(body: Uint8Array): string | undefined {
  if (body.length === 0) return undefined;
  const text = toText(body);

  if (looksLikeXml(text)) {
    const match = /srsName="([^"]+)"/.exec(text);
    return match ? normalizeCrs(match[1]) : undefined;
  }

  const json = parseJson(text);
  if (!json || !isRecord(json.crs) || !isRecord(json.crs.properties)) return undefined;
  const name = json.crs.properties.name;
  return typeof name === "string" ? normalizeCrs(name) : undefined;
}
