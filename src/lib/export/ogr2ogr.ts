/**
 * GeometryConverter backed by the GDAL ogr2ogr command.
 *
 * Pages are written to a temp directory and translated one by one into the
 * target file, the first page creating it and later pages appended.
 * DXF and Shapefile are merged through a GeoPackage first, since neither
 * driver appends reliably. Shapefile output is zipped with its sidecars.
 */

import { execFile } from "child_process";
import { promisify } from "util";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import JSZip from "jszip";
import { exportLogger } from "@/lib/logger";
import type { OutputFormat } from "@/lib/wfs/types";
import {
  ConversionError,
  ConverterUnavailableError,
  type ConverterTarget,
  type GeometryConverter,
} from "./types";

const execFileAsync = promisify(execFile);

export const OGR_LAYER = "parcels";

const DRIVERS: Record<ConverterTarget, { driver: string; extension: string }> = {
  geojson: { driver: "GeoJSON", extension: ".geojson" },
  gpkg: { driver: "GPKG", extension: ".gpkg" },
  shp: { driver: "ESRI Shapefile", extension: ".shp" },
  dxf: { driver: "DXF", extension: ".dxf" },
};

const SHAPEFILE_SIDECARS = [".shp", ".shx", ".dbf", ".prj", ".cpg"];

/** Runs a command; rejects with the child_process error on failure. */
export type CommandRunner = (command: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

const defaultRunner: CommandRunner = (command, args) =>
  execFileAsync(command, args, { maxBuffer: 16 * 1024 * 1024 });

export interface Ogr2OgrOptions {
  /** Executable name or path, default "ogr2ogr" (or OGR2OGR_PATH) */
  command?: string;
  runner?: CommandRunner;
  /** Parent of the per-conversion temp directory, default os.tmpdir() */
  tempRoot?: string;
}

function stderrOf(error: unknown): string {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const { stderr } = error;
    if (typeof stderr === "string") return stderr.trim();
  }
  return "";
}

function isMissingCommand(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

export class Ogr2OgrConverter implements GeometryConverter {
  private readonly command: string;
  private readonly runner: CommandRunner;
  private readonly tempRoot: string;

  constructor(options: Ogr2OgrOptions = {}) {
    this.command = options.command ?? process.env.OGR2OGR_PATH ?? "ogr2ogr";
    this.runner = options.runner ?? defaultRunner;
    this.tempRoot = options.tempRoot ?? os.tmpdir();
  }

  private async run(args: string[]): Promise<void> {
    try {
      await this.runner(this.command, args);
    } catch (error) {
      if (isMissingCommand(error)) {
        throw new ConverterUnavailableError(this.command);
      }
      const stderr = stderrOf(error);
      throw new ConversionError(stderr || `${this.command} failed: ${args.join(" ")}`, stderr);
    }
  }

  /**
   * Translate `inputs` into `output`. Appending a page that fails is logged
   * and skipped; the first page must succeed.
   */
  private async translate(
    driver: string,
    output: string,
    inputs: readonly string[],
    extra: string[] = [],
  ): Promise<void> {
    const [first, ...rest] = inputs;
    await this.run(["-f", driver, output, first, "-nln", OGR_LAYER, ...extra]);

    for (const input of rest) {
      try {
        await this.run(["-f", driver, output, input, "-nln", OGR_LAYER, "-update", "-append", ...extra]);
      } catch (error) {
        if (error instanceof ConverterUnavailableError) throw error;
        exportLogger.warn({ err: error, input: path.basename(input) }, "Skipping page that failed to append");
      }
    }
  }

  async convert(
    pages: readonly Uint8Array[],
    target: ConverterTarget,
    input: OutputFormat,
  ): Promise<Uint8Array> {
    if (pages.length === 0) {
      throw new ConversionError("No pages to convert", "");
    }

    const dir = await fs.mkdtemp(path.join(this.tempRoot, "cadastre-"));
    try {
      const extension = input === "geojson" ? ".geojson" : ".gml";
      const inputs: string[] = [];
      for (const [i, page] of pages.entries()) {
        const file = path.join(dir, `in_${String(i + 1).padStart(3, "0")}${extension}`);
        await fs.writeFile(file, page);
        inputs.push(file);
      }

      const { driver, extension: outExtension } = DRIVERS[target];
      const output = path.join(dir, `${OGR_LAYER}${outExtension}`);

      exportLogger.debug({ target, pages: pages.length, dir }, "Converting pages with ogr2ogr");

      if (target === "dxf" || target === "shp") {
        const merged = path.join(dir, "merge.gpkg");
        await this.translate("GPKG", merged, inputs, ["-nlt", "MULTIPOLYGON", "-explodecollections"]);
        await this.run(["-f", driver, output, merged, "-nln", OGR_LAYER]);
      } else {
        await this.translate(driver, output, inputs);
      }

      if (target === "shp") {
        return await zipShapefile(dir, OGR_LAYER);
      }
      return new Uint8Array(await fs.readFile(output));
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

async function zipShapefile(dir: string, baseName: string): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const extension of SHAPEFILE_SIDECARS) {
    const file = `${baseName}${extension}`;
    try {
      zip.file(file, await fs.readFile(path.join(dir, file)));
    } catch (error) {
      exportLogger.debug({ err: error, file }, "Shapefile sidecar not produced");
    }
  }
  return zip.generateAsync({ type: "uint8array", compression: "DEFLATE" });
}
