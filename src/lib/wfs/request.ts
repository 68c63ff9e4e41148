/**
 * WFS 2.0 GetFeature URL builder.
 */

import { GEOJSON_OUTPUT_FORMAT, WFS_VERSION } from "./wfs-config";
import type { FilterDialect, OutputFormat } from "./types";

export interface GetFeatureParams {
  typeName: string;
  count: number;
  startIndex: number;
  filter: { dialect: FilterDialect; expression: string };
  /** Omitted means the server's default CRS */
  srsName?: string;
  /** "gml" leaves outputFormat unset (GML 3.2 is the WFS 2.0 default) */
  format: OutputFormat;
}

export function buildGetFeatureUrl(baseUrl: string, params: GetFeatureParams): string {
  const url = new URL(baseUrl);
  url.searchParams.set("service", "WFS");
  url.searchParams.set("version", WFS_VERSION);
  url.searchParams.set("request", "GetFeature");
  url.searchParams.set("typeNames", params.typeName);
  url.searchParams.set("count", String(params.count));
  url.searchParams.set("startIndex", String(params.startIndex));

  if (params.filter.dialect === "fes") {
    url.searchParams.set("filter", params.filter.expression);
  } else {
    url.searchParams.set("CQL_FILTER", params.filter.expression);
  }

  if (params.srsName) {
    url.searchParams.set("srsName", params.srsName);
  }

  if (params.format === "geojson") {
    url.searchParams.set("outputFormat", GEOJSON_OUTPUT_FORMAT);
  }

  return url.toString();
}
