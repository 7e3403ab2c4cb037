import { LandsatError } from "@landsat-archive/mtl";

/** Base class for errors raised while resolving a Landsat archive. */
export class LandsatArchiveError extends LandsatError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LandsatArchiveError";
  }
}

/** The spacecraft and sensor pair has no entry in the band table. */
export class BandMapError extends LandsatArchiveError {
  readonly key: string;

  constructor(key: string, options?: ErrorOptions) {
    super(`No band mapping found for ${key}`, options);
    this.name = "BandMapError";
    this.key = key;
  }
}

/** The source is neither a directory, a metadata file nor a known archive. */
export class UnsupportedSourceError extends LandsatArchiveError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "UnsupportedSourceError";
  }
}

/** A band identifier resolves neither as a band code nor as an alias. */
export class BandNotFoundError extends LandsatArchiveError {
  readonly band: string;

  constructor(band: string, options?: ErrorOptions) {
    super(`Band ${band} not found`, options);
    this.name = "BandNotFoundError";
    this.band = band;
  }
}
