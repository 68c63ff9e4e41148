/**
 * Turns a successful fetch into a downloadable file.
 *
 * gml-zip needs nothing but jszip. Every other format goes through the
 * injected GeometryConverter; DXF from GeoJSON pages falls back to the
 * built-in writer when the converter is missing.
 */

import { exportLogger } from "@/lib/logger";
import { type FetchResult, errorMessage } from "@/lib/wfs/types";
import { geoJsonPagesToDxf } from "./dxf";
import { zipGmlPages } from "./gml-zip";
import {
  ConversionError,
  ConverterUnavailableError,
  ExportFailureKind,
  type ExportFormat,
  type ExportResult,
  FORMAT_INFO,
  type GeometryConverter,
} from "./types";

export interface ExportOptions {
  /** File name without extension, default "parcels" */
  baseName?: string;
}

function fileNameFor(format: ExportFormat, baseName: string): string {
  return `${baseName}${FORMAT_INFO[format].extension}`;
}

function converterUnavailable(message: string): ExportResult {
  return { success: false, failure: ExportFailureKind.CONVERTER_UNAVAILABLE, message };
}

/**
 * Export the pages of `result` as `format`. Never throws.
 */
export async function exportParcels(
  result: Pick<FetchResult, "success" | "pages" | "format">,
  format: ExportFormat,
  converter?: GeometryConverter,
  options: ExportOptions = {},
): Promise<ExportResult> {
  const baseName = options.baseName ?? "parcels";

  if (!result.success || result.pages.length === 0) {
    return { success: false, failure: ExportFailureKind.NO_PAGES, message: "Nothing to export: no pages were fetched." };
  }

  const ok = (data: Uint8Array, producedBy: "zip" | "converter" | "dxf-writer"): ExportResult => ({
    success: true,
    data,
    fileName: fileNameFor(format, baseName),
    mimeType: FORMAT_INFO[format].mimeType,
    producedBy,
  });

  const dxfWriterFallback = (): ExportResult => {
    const dxf = geoJsonPagesToDxf(result.pages);
    exportLogger.info({ entities: dxf.entities }, "DXF written without converter");
    return ok(dxf.data, "dxf-writer");
  };

  if (format === "gml-zip") {
    if (result.format !== "gml") {
      return {
        success: false,
        failure: ExportFailureKind.UNSUPPORTED_FORMAT,
        message: "gml-zip needs GML pages; fetch with format \"gml\".",
      };
    }
    return ok(await zipGmlPages(result.pages), "zip");
  }

  if (!converter) {
    if (format === "dxf" && result.format === "geojson") return dxfWriterFallback();
    return converterUnavailable(`No converter configured for ${format}. Choose gml-zip instead.`);
  }

  try {
    const data = await converter.convert(result.pages, format, result.format);
    exportLogger.info({ format, bytes: data.length }, "Export converted");
    return ok(data, "converter");
  } catch (error) {
    if (error instanceof ConverterUnavailableError) {
      if (format === "dxf" && result.format === "geojson") return dxfWriterFallback();
      return converterUnavailable(error.message);
    }
    exportLogger.error({ err: errorMessage(error), format }, "Export conversion failed");
    const message =
      error instanceof ConversionError
        ? `Conversion to ${format} failed: ${error.message}`
        : `Conversion to ${format} failed: ${errorMessage(error)}`;
    return { success: false, failure: ExportFailureKind.CONVERSION_FAILED, message };
  }
}
