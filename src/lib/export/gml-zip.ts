import JSZip from "jszip";

/** Entry name of the n-th page (1-based), e.g. parcels_001.gml */
export function gmlEntryName(index: number): string {
  return `parcels_${String(index).padStart(3, "0")}.gml`;
}

/**
 * Package raw GML pages into a zip, one entry per page, in page order.
 * No conversion happens; the server's documents are stored as-is.
 */
export async function zipGmlPages(pages: readonly Uint8Array[]): Promise<Uint8Array> {
  const zip = new JSZip();
  pages.forEach((page, i) => {
    zip.file(gmlEntryName(i + 1), page);
  });
  return zip.generateAsync({ type: "uint8array", compression: "DEFLATE" });
}
