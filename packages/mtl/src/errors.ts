/** Base class for every error raised while reading a Landsat product. */
export class LandsatError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LandsatError";
  }
}

/** Base class for errors raised by the metadata engine. */
export class LandsatMetadataError extends LandsatError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LandsatMetadataError";
  }
}

/**
 * The metadata file is missing, has the wrong suffix, or lacks the identity
 * fields needed downstream.
 */
export class MetadataFileError extends LandsatMetadataError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MetadataFileError";
  }
}

/** The metadata text is structurally malformed or holds no records. */
export class ParsingError extends LandsatMetadataError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ParsingError";
  }
}

/** A group was requested that the parsed metadata does not contain. */
export class GroupError extends LandsatMetadataError {
  readonly group: string;

  constructor(group: string, options?: ErrorOptions) {
    super(`Not possible to iterate over non existing group: ${group}`, options);
    this.name = "GroupError";
    this.group = group;
  }
}
