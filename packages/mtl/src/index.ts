export type { MetadataValue, TypedValue, ValueType } from "./cast.js";
export { castToBest } from "./cast.js";
export {
  GroupError,
  LandsatError,
  LandsatMetadataError,
  MetadataFileError,
  ParsingError,
} from "./errors.js";
export type { RawGroup } from "./lexer.js";
export { lexer } from "./lexer.js";
export type {
  GroupResult,
  LandsatMetadataOptions,
  TextReader,
} from "./metadata.js";
export { LandsatMetadata, parseMetadataText } from "./metadata.js";
export { parser } from "./parser.js";
export { MetadataRecord } from "./record.js";
export { scanner, splitLines } from "./scanner.js";
