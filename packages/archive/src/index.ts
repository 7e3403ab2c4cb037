export type { ArchiveContainer } from "./container.js";
export { openContainer, withContainer } from "./archive-opener.js";
export type { BandMap, BandMapping } from "./band-map.js";
export { BAND_MAP, dispatchMapping } from "./band-map.js";
export type { BandFileIndex } from "./bands.js";
export { buildBandIndex } from "./bands.js";
export type { ArchiveFormat } from "./detect.js";
export {
  detectArchiveFormat,
  isTarHeader,
  sniffArchiveFormat,
} from "./detect.js";
export {
  BandMapError,
  BandNotFoundError,
  LandsatArchiveError,
  UnsupportedSourceError,
} from "./errors.js";
export type { ReadOptions } from "./landsat-archive.js";
export { defaultExtractPath, LandsatArchive } from "./landsat-archive.js";
export type { BandRaster, RasterOpener } from "./raster.js";
export { FileSource, GeoTIFFBand, openGeoTIFF } from "./raster.js";
export type { MetadataTemplate } from "./sniff.js";
export {
  DEFAULT_METADATA_TEMPLATE,
  findMetadataEntry,
  metadataSniffer,
} from "./sniff.js";
export { TarContainer } from "./tar.js";
export { entryTarget, ZipContainer } from "./zip.js";
