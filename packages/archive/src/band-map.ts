import type { LandsatMetadata } from "@landsat-archive/mtl";
import { MetadataFileError } from "@landsat-archive/mtl";
import { BandMapError } from "./errors.js";

/** Sensor-specific band aliases (e.g. "red") to band codes (e.g. "4"). */
export type BandMapping = Readonly<Record<string, string>>;

/** Band mappings keyed by `"<SPACECRAFT_ID>_<SENSOR_ID>"`. */
export type BandMap = Readonly<Record<string, BandMapping>>;

function pair(aliases: string, codes: string): BandMapping {
  const names = aliases.split(" ");
  const values = codes.split(" ");
  if (names.length !== values.length) {
    throw new Error(`Band aliases and codes differ in length: ${aliases}`);
  }
  return Object.freeze(
    Object.fromEntries(names.map((name, i) => [name, values[i] ?? ""])),
  );
}

const MSS_OLD = pair("green red nir1 nir2", "4 5 6 7");
const MSS_NEW = pair("green red nir1 nir2", "1 2 3 4");
const TM = pair("blue green red nir swir1 tirs swir2", "1 2 3 4 5 6 7");

/** The built-in band table for Landsat 1 through 8. */
export const BAND_MAP: BandMap = Object.freeze({
  LANDSAT_1_MSS: MSS_OLD,
  LANDSAT_2_MSS: MSS_OLD,
  LANDSAT_3_MSS: MSS_OLD,
  LANDSAT_4_MSS: MSS_NEW,
  LANDSAT_5_MSS: MSS_NEW,
  LANDSAT_4_TM: TM,
  LANDSAT_5_TM: TM,
  LANDSAT_7_ETM: pair(
    "blue green red nir swir1 tirs_low tirs_high swir2 panchromatic bq",
    "1 2 3 4 5 6_VCID_1 6_VCID_2 7 8 QUALITY",
  ),
  LANDSAT_8_OLI_TIRS: pair(
    "coastal blue green red nir swir1 swir2 panchromatic cirrus tirs1 tirs2 bq",
    "1 2 3 4 5 6 7 8 9 10 11 QUALITY",
  ),
});

/**
 * Select the band mapping matching the spacecraft and sensor named in the
 * metadata's `PRODUCT_METADATA` group.
 *
 * @throws {MetadataFileError} if `SPACECRAFT_ID` or `SENSOR_ID` is missing.
 * @throws {BandMapError} if the pair has no entry in `bandMap`.
 */
export function dispatchMapping(
  meta: LandsatMetadata,
  bandMap: BandMap = BAND_MAP,
): BandMapping {
  const spacecraft = meta.get("PRODUCT_METADATA", "SPACECRAFT_ID");
  const sensor = meta.get("PRODUCT_METADATA", "SENSOR_ID");

  if (spacecraft === undefined || sensor === undefined) {
    throw new MetadataFileError(
      "Metadata does not contain a spacecraft or sensor attribute",
    );
  }

  const key = `${spacecraft}_${sensor}`;
  // Own keys only, so "constructor" and friends never resolve.
  const mapping = Object.hasOwn(bandMap, key) ? bandMap[key] : undefined;
  if (mapping === undefined) {
    throw new BandMapError(key);
  }
  return mapping;
}
