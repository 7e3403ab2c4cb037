import type { LandsatMetadata } from "@landsat-archive/mtl";

/** Band codes (as written in `FILE_NAME_BAND_<code>`) to file names. */
export type BandFileIndex = ReadonlyMap<string, string>;

const FILE_NAME_BAND = /^FILE_NAME_BAND_(?<code>(?:\d{1,2}|[A-Za-z]+).*)$/i;

/**
 * Collect the band file names listed in the `PRODUCT_METADATA` group.
 *
 * @throws {GroupError} if the metadata has no `PRODUCT_METADATA` group.
 */
export function buildBandIndex(meta: LandsatMetadata): BandFileIndex {
  const index = new Map<string, string>();

  for (const [key, value] of meta.iterGroup("PRODUCT_METADATA")) {
    const code = FILE_NAME_BAND.exec(key)?.groups?.code;
    if (code !== undefined) {
      index.set(code, String(value));
    }
  }

  return index;
}
