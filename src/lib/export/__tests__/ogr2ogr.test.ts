import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import JSZip from "jszip";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock("@/lib/logger", () => ({
  logger: mockLogger,
  exportLogger: mockLogger,
}));

import { Ogr2OgrConverter, type CommandRunner } from "../ogr2ogr";
import { ConversionError, ConverterUnavailableError } from "../types";
import { gmlPage } from "@/lib/wfs/__tests__/fake-wfs";

/**
 * Stand-in for ogr2ogr: records arguments and writes "<driver> from <inputs>"
 * into the output file (plus sidecars for shapefiles).
 */
function fakeOgr(options: { failOn?: (args: string[]) => boolean } = {}) {
  const calls: string[][] = [];
  const runner = vi.fn<CommandRunner>(async (_command, args) => {
    calls.push(args);
    if (options.failOn?.(args)) {
      throw Object.assign(new Error("Command failed"), { code: 1, stderr: "ERROR 1: broken page\n" });
    }
    const [, driver, output, input] = args;
    await fs.appendFile(output, `${driver} from ${path.basename(input)};`);
    if (driver === "ESRI Shapefile") {
      const base = output.replace(/\.shp$/, "");
      await fs.writeFile(`${base}.dbf`, "dbf");
      await fs.writeFile(`${base}.shx`, "shx");
    }
    return { stdout: "", stderr: "" };
  });
  return { runner, calls };
}

describe("Ogr2OgrConverter", () => {
  let tempRoot: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), "ogr-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempRoot, { recursive: true, force: true });
  });

  it("translates the first page and appends the rest", async () => {
    const { runner, calls } = fakeOgr();
    const converter = new Ogr2OgrConverter({ command: "ogr2ogr", runner, tempRoot });

    const data = await converter.convert([gmlPage(1), gmlPage(1)], "gpkg", "gml");

    expect(new TextDecoder().decode(data)).toBe("GPKG from in_001.gml;GPKG from in_002.gml;");
    expect(calls).toHaveLength(2);
    expect(calls[0].slice(0, 2)).toEqual(["-f", "GPKG"]);
    expect(path.basename(calls[0][3])).toBe("in_001.gml");
    expect(calls[0].slice(4)).toEqual(["-nln", "parcels"]);
    expect(calls[1].slice(4)).toEqual(["-nln", "parcels", "-update", "-append"]);
  });

  it("merges through a GeoPackage for DXF", async () => {
    const { runner, calls } = fakeOgr();
    const converter = new Ogr2OgrConverter({ runner, tempRoot });

    const data = await converter.convert([gmlPage(1), gmlPage(1)], "dxf", "gml");

    expect(calls.map((args) => args[1])).toEqual(["GPKG", "GPKG", "DXF"]);
    expect(calls[0].slice(4)).toEqual(["-nln", "parcels", "-nlt", "MULTIPOLYGON", "-explodecollections"]);
    expect(calls[1].slice(4)).toEqual([
      "-nln", "parcels", "-update", "-append", "-nlt", "MULTIPOLYGON", "-explodecollections",
    ]);
    expect(path.basename(calls[2][3])).toBe("merge.gpkg");
    expect(new TextDecoder().decode(data)).toBe("DXF from merge.gpkg;");
  });

  it("zips shapefile sidecars", async () => {
    const { runner } = fakeOgr();
    const converter = new Ogr2OgrConverter({ runner, tempRoot });

    const data = await converter.convert([gmlPage(1)], "shp", "gml");

    const zip = await JSZip.loadAsync(data);
    expect(Object.keys(zip.files).sort()).toEqual(["parcels.dbf", "parcels.shp", "parcels.shx"]);
  });

  it("writes GeoJSON pages with a .geojson extension", async () => {
    const { runner, calls } = fakeOgr();
    const converter = new Ogr2OgrConverter({ runner, tempRoot });

    await converter.convert([new TextEncoder().encode('{"type":"FeatureCollection","features":[]}')], "geojson", "geojson");

    expect(path.basename(calls[0][3])).toBe("in_001.geojson");
    expect(path.basename(calls[0][2])).toBe("parcels.geojson");
  });

  it("skips pages that fail to append", async () => {
    const { runner } = fakeOgr({ failOn: (args) => args[3].endsWith("in_002.gml") });
    const converter = new Ogr2OgrConverter({ runner, tempRoot });

    const data = await converter.convert([gmlPage(1), gmlPage(1), gmlPage(1)], "gpkg", "gml");

    expect(new TextDecoder().decode(data)).toBe("GPKG from in_001.gml;GPKG from in_003.gml;");
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it("raises ConversionError with stderr when the first page fails", async () => {
    const { runner } = fakeOgr({ failOn: () => true });
    const converter = new Ogr2OgrConverter({ runner, tempRoot });

    const error = await converter.convert([gmlPage(1)], "gpkg", "gml").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toMatchObject({ message: "ERROR 1: broken page", stderr: "ERROR 1: broken page" });
  });

  it("raises ConverterUnavailableError when ogr2ogr is missing", async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw Object.assign(new Error("spawn ogr2ogr ENOENT"), { code: "ENOENT" });
    });
    const converter = new Ogr2OgrConverter({ runner, tempRoot });

    await expect(converter.convert([gmlPage(1)], "gpkg", "gml")).rejects.toBeInstanceOf(ConverterUnavailableError);
  });

  it("removes its temp directory", async () => {
    const { runner } = fakeOgr();
    const converter = new Ogr2OgrConverter({ runner, tempRoot });

    await converter.convert([gmlPage(1)], "gpkg", "gml");

    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it("refuses an empty page list", async () => {
    const { runner } = fakeOgr();
    const converter = new Ogr2OgrConverter({ runner, tempRoot });

    await expect(converter.convert([], "gpkg", "gml")).rejects.toBeInstanceOf(ConversionError);
    expect(runner).not.toHaveBeenCalled();
  });
});
