/**
 * Export Types
 */

import type { OutputFormat } from "@/lib/wfs/types";

export type ExportFormat = "gml-zip" | "geojson" | "gpkg" | "shp" | "dxf";

/** Formats produced by the external geometry converter */
export type ConverterTarget = Exclude<ExportFormat, "gml-zip">;

export const EXPORT_FORMATS = ["gml-zip", "geojson", "gpkg", "shp", "dxf"] as const satisfies readonly ExportFormat[];

export const FORMAT_INFO: Record<ExportFormat, { extension: string; mimeType: string }> = {
  "gml-zip": { extension: ".zip", mimeType: "application/zip" },
  geojson: { extension: ".geojson", mimeType: "application/geo+json" },
  gpkg: { extension: ".gpkg", mimeType: "application/geopackage+sqlite3" },
  shp: { extension: ".zip", mimeType: "application/zip" },
  dxf: { extension: ".dxf", mimeType: "application/dxf" },
};

export enum ExportFailureKind {
  CONVERTER_UNAVAILABLE = "CONVERTER_UNAVAILABLE",
  CONVERSION_FAILED = "CONVERSION_FAILED",
  NO_PAGES = "NO_PAGES",
  UNSUPPORTED_FORMAT = "UNSUPPORTED_FORMAT",
}

/**
 * Turns raw WFS pages into one file of the target format.
 * Throws ConverterUnavailableError when the tool is missing and
 * ConversionError when it ran and failed.
 */
export interface GeometryConverter {
  convert(
    pages: readonly Uint8Array[],
    target: ConverterTarget,
    input: OutputFormat,
  ): Promise<Uint8Array>;
}

export type ExportResult =
  | {
      success: true;
      data: Uint8Array;
      fileName: string;
      mimeType: string;
      /** What produced the file */
      producedBy: "zip" | "converter" | "dxf-writer";
    }
  | {
      success: false;
      failure: ExportFailureKind;
      message: string;
    };

// =============================================================================
// Errors
// =============================================================================

export class ConverterUnavailableError extends Error {
  constructor(public readonly command: string) {
    super(`${command} not found. Install GDAL or choose the gml-zip output.`);
    this.name = "ConverterUnavailableError";
  }
}

export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "ConversionError";
  }
}
