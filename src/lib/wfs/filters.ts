/**
 * Filter builders for WFS GetFeature requests.
 *
 * FES 2.0 XML is the primary dialect. CQL (a GeoServer extension) is only
 * used when the server rejects an FES request.
 */

import { LABEL_PROPERTY, REFERENCE_PROPERTY } from "./wfs-config";

const FES_NS = "http://www.opengis.net/fes/2.0";

// ---------------------------------------------------------------
// Escaping
// ---------------------------------------------------------------

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Quote a CQL string literal, doubling embedded single quotes. */
export function quoteCql(str: string): string {
  return `'${str.replace(/'/g, "''")}'`;
}

// ---------------------------------------------------------------
// FES
// ---------------------------------------------------------------

function zonePrefixPredicate(zoneCode: string): string {
  return (
    `<PropertyIsLike wildCard="*" singleChar="." escape="!" matchCase="false">` +
    `<ValueReference>${REFERENCE_PROPERTY}</ValueReference>` +
    `<Literal>${escapeXml(zoneCode)}*</Literal>` +
    `</PropertyIsLike>`
  );
}

function equalTo(property: string, value: string): string {
  return (
    `<PropertyIsEqualTo><ValueReference>${property}</ValueReference>` +
    `<Literal>${escapeXml(value)}</Literal></PropertyIsEqualTo>`
  );
}

function wrapFilter(body: string): string {
  return `<Filter xmlns="${FES_NS}">${body}</Filter>`;
}

/**
 * Build an FES filter: an OR of (label = p AND reference LIKE 'zone*') per
 * parcel label, or the zone-prefix predicate alone. Returns "" when there is
 * nothing to filter on.
 */
export function buildFesFilter(zoneCode: string | undefined, parcelLabels: readonly string[]): string {
  const zone = zoneCode?.trim() ?? "";
  const labels = parcelLabels.filter((label) => label.length > 0);
  const zonePart = zone ? zonePrefixPredicate(zone) : "";

  if (labels.length > 0) {
    const clauses = labels.map(
      (label) => `<And>${equalTo(LABEL_PROPERTY, label)}${zonePart}</And>`,
    );
    return wrapFilter(`<Or>${clauses.join("")}</Or>`);
  }

  if (zonePart) {
    return wrapFilter(zonePart);
  }

  return "";
}

/** Exact-match filter on the zone reference, used against the zoning layer. */
export function buildFesEqualsFilter(zoneCode: string): string {
  return wrapFilter(equalTo(REFERENCE_PROPERTY, zoneCode));
}

// ---------------------------------------------------------------
// CQL
// ---------------------------------------------------------------

/**
 * Build the CQL equivalent: `label IN (...) AND reference LIKE 'zone%'`.
 * Coarser than the FES form (labels are not paired with the zone per
 * clause) but equivalent for a single zone.
 */
export function buildCqlFilter(zoneCode: string | undefined, parcelLabels: readonly string[]): string {
  const zone = zoneCode?.trim() ?? "";
  const labels = parcelLabels.filter((label) => label.length > 0);
  const parts: string[] = [];

  if (labels.length > 0) {
    parts.push(`${LABEL_PROPERTY} IN (${labels.map(quoteCql).join(",")})`);
  }
  if (zone) {
    parts.push(`${REFERENCE_PROPERTY} LIKE ${quoteCql(`${zone}%`)}`);
  }

  return parts.join(" AND ");
}

export function buildCqlEqualsFilter(zoneCode: string): string {
  return `${REFERENCE_PROPERTY}=${quoteCql(zoneCode)}`;
}
