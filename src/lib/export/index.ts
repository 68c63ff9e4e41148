/**
 * Export Utilities
 *
 * Packaging and conversion of fetched parcel pages into GIS files.
 */

// Types
export * from './types';

// Parcel export
export { exportParcels } from './parcel-export';
export type { ExportOptions } from './parcel-export';

// Writers
export { zipGmlPages, gmlEntryName } from './gml-zip';
export { geoJsonPagesToDxf, DXF_LAYER } from './dxf';
export type { DxfDocument } from './dxf';

// GDAL converter
export { Ogr2OgrConverter, OGR_LAYER } from './ogr2ogr';
export type { CommandRunner, Ogr2OgrOptions } from './ogr2ogr';
