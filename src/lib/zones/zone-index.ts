/**
 * Cadastral zone lookup by name or code.
 *
 * Reads a static list of zones, one per line, either as `"Name" 123456`
 * or as CSV `name,code`. Matching ignores case, diacritics and punctuation,
 * so "bratislava - stare mesto" finds "Bratislava-Staré Mesto".
 */

import { readFile } from "node:fs/promises";
import { zoneLogger } from "@/lib/logger";

export interface Zone {
  name: string;
  /** Numeric code kept as a string (six or more digits) */
  code: string;
}

interface IndexedZone extends Zone {
  normalized: string;
}

export interface ZoneLookup {
  /** Resolved code (the best-ranked candidate for a partial name), or null when the query is empty or unknown */
  code: string | null;
  /** Up to ten candidates for the caller to choose from */
  candidates: Zone[];
}

export const DEFAULT_ZONE_INDEX_URL = new URL("../../../data/zones.txt", import.meta.url);

const QUOTED_LINE = /^\s*"(.+?)"\s+(\d{6,})\s*$/;
const CODE_ONLY = /^\d{6,}$/;
const MAX_CANDIDATES = 10;

// ---------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------

/** Lowercase, strip diacritics, turn dashes and punctuation into single spaces. */
export function normalizeZoneName(name: string): string {
  return name
    .normalize("NFD")
    .replace(/\p{Mn}/gu, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

// ---------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------

function parseLine(line: string): Zone | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;

  const quoted = QUOTED_LINE.exec(trimmed);
  if (quoted) {
    return { name: quoted[1].trim(), code: quoted[2] };
  }

  const parts = trimmed.split(",").map((part) => part.trim().replace(/^"|"$/g, ""));
  if (parts.length >= 2 && CODE_ONLY.test(parts[1])) {
    return { name: parts[0], code: parts[1] };
  }

  return null;
}

/**
 * Parse zone list text. Unrecognised lines are skipped; the first
 * occurrence of a code wins.
 */
export function parseZoneList(text: string): Zone[] {
  const seen = new Set<string>();
  const zones: Zone[] = [];

  for (const line of text.split(/\r?\n/)) {
    const zone = parseLine(line);
    if (!zone || seen.has(zone.code)) continue;
    seen.add(zone.code);
    zones.push(zone);
  }

  return zones;
}

// ---------------------------------------------------------------
// Index
// ---------------------------------------------------------------

export class ZoneIndex {
  private readonly zones: IndexedZone[];

  constructor(zones: readonly Zone[]) {
    this.zones = zones.map((zone) => ({ ...zone, normalized: normalizeZoneName(zone.name) }));
  }

  get size(): number {
    return this.zones.length;
  }

  /**
   * Resolve a zone code from user input.
   *
   * A 6+-digit input is taken as a code as-is. Otherwise an exact
   * normalized name match wins; failing that, names containing the query
   * are candidates, shortest first, and the first is returned as the code.
   */
  resolve(query: string): ZoneLookup {
    const q = query.trim();
    if (!q) return { code: null, candidates: [] };
    if (CODE_ONLY.test(q)) return { code: q, candidates: [] };

    const normalized = normalizeZoneName(q);
    if (!normalized) return { code: null, candidates: [] };

    const exact = this.zones.find((zone) => zone.normalized === normalized);
    if (exact) return { code: exact.code, candidates: [toZone(exact)] };

    const hits = this.zones
      .filter((zone) => zone.normalized.includes(normalized))
      .sort(
        (a, b) =>
          a.normalized.length - b.normalized.length || a.normalized.localeCompare(b.normalized),
      );

    if (hits.length === 0) return { code: null, candidates: [] };
    return { code: hits[0].code, candidates: hits.slice(0, MAX_CANDIDATES).map(toZone) };
  }
}

function toZone({ name, code }: IndexedZone): Zone {
  return { name, code };
}

/**
 * Load the zone index from disk. A missing or unreadable file yields an
 * empty index: codes typed by hand still resolve.
 */
export async function loadZoneIndex(path: string | URL = DEFAULT_ZONE_INDEX_URL): Promise<ZoneIndex> {
  try {
    const text = await readFile(path, "utf-8");
    const zones = parseZoneList(text);
    zoneLogger.debug({ path: String(path), zones: zones.length }, "Zone index loaded");
    return new ZoneIndex(zones);
  } catch (error) {
    zoneLogger.warn({ err: error, path: String(path) }, "Zone index unavailable, only numeric codes resolve");
    return new ZoneIndex([]);
  }
}
