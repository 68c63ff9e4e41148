/**
 * DXF writer for GeoJSON parcel pages, used when GDAL is not installed.
 *
 * Every polygon ring becomes one closed LWPOLYLINE on layer PARCELS.
 * Points and lines are ignored.
 */

import Drawing from "dxf-writer";
import { parseFeatures, type Geometry, type Position } from "@/lib/wfs/geometry";

export const DXF_LAYER = "PARCELS";

// AutoCAD color index 7: white on dark, black on light backgrounds
const LAYER_COLOR = 7;

type Ring = Array<[number, number]>;

function toRing(positions: readonly Position[]): Ring | null {
  const points: Ring = positions.map(([x, y]) => [x, y]);
  if (points.length < 2) return null;

  const first = points[0];
  const last = points[points.length - 1];
  if (first[0] === last[0] && first[1] === last[1]) points.pop();

  return points.length >= 2 ? points : null;
}

function ringsOf(geometry: Geometry): Ring[] {
  switch (geometry.type) {
    case "Polygon":
      return geometry.coordinates.map(toRing).filter((ring): ring is Ring => ring !== null);
    case "MultiPolygon":
      return geometry.coordinates.flatMap((polygon) =>
        polygon.map(toRing).filter((ring): ring is Ring => ring !== null),
      );
    case "GeometryCollection":
      return geometry.geometries.flatMap(ringsOf);
    default:
      return [];
  }
}

export interface DxfDocument {
  data: Uint8Array;
  /** LWPOLYLINE entities written */
  entities: number;
}

/**
 * Write every polygon ring of the given GeoJSON pages as a DXF document.
 * Unparseable pages contribute nothing.
 */
export function geoJsonPagesToDxf(pages: readonly Uint8Array[]): DxfDocument {
  const rings = pages.flatMap((page) =>
    parseFeatures(page).flatMap((feature) => (feature.geometry ? ringsOf(feature.geometry) : [])),
  );

  const drawing = new Drawing();
  drawing.addLayer(DXF_LAYER, LAYER_COLOR, "CONTINUOUS");
  drawing.setActiveLayer(DXF_LAYER);
  for (const ring of rings) {
    drawing.drawPolyline(ring, true);
  }

  return {
    data: new TextEncoder().encode(drawing.toDxfString()),
    entities: rings.length,
  };
}
