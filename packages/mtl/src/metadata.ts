import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import type { MetadataValue } from "./cast.js";
import { GroupError, MetadataFileError } from "./errors.js";
import { lexer } from "./lexer.js";
import { parser } from "./parser.js";
import type { MetadataRecord } from "./record.js";
import { scanner, splitLines } from "./scanner.js";

/** Reads a metadata file into text. */
export type TextReader = (path: string) => Promise<string>;

/** The (key, value) pairs of a group, or the reason there are none. */
export type GroupResult =
  | { ok: true; entries: Array<[string, MetadataValue]> }
  | { ok: false; error: GroupError };

export interface LandsatMetadataOptions {
  /**
   * Hook used by {@link LandsatMetadata.parse} to load the file.
   *
   * Defaults to reading the path as UTF-8 from disk.
   */
  readText?: TextReader;
}

const readUtf8: TextReader = (path) => readFile(path, "utf8");

/**
 * Parse metadata text into records.
 *
 * Runs the scanner, lexer and parser over the full text.
 */
export function parseMetadataText(content: string): MetadataRecord[] {
  return parser(lexer(scanner(splitLines(content))));
}

/**
 * The parsed content of one Landsat metadata (MTL) file, indexed by group
 * name.
 *
 * ```ts
 * const meta = new LandsatMetadata("/data/scene/LC08_L1TP_MTL.txt");
 * await meta.parse();
 * meta.get("product_metadata", "spacecraft_id"); // "LANDSAT_8"
 * ```
 */
export class LandsatMetadata {
  private _path: string;
  private readonly readText: TextReader;
  private records = new Map<string, MetadataRecord>();

  constructor(
    path: string,
    { readText = readUtf8 }: LandsatMetadataOptions = {},
  ) {
    this._path = LandsatMetadata.checkPath(path);
    this.readText = readText;
  }

  /** Path of the metadata file. */
  get path(): string {
    return this._path;
  }

  /** Point the store at another file. Parsed records are dropped. */
  set path(value: string) {
    this._path = LandsatMetadata.checkPath(value);
    this.clear();
  }

  /** Group names in parse order. */
  get groups(): string[] {
    return Array.from(this.records.keys());
  }

  /**
   * Read and parse the metadata file, replacing any records from an earlier
   * parse.
   *
   * @throws {ParsingError} if the file is malformed or holds no records.
   */
  async parse(): Promise<void> {
    const content = await this.readText(this._path);
    const parsed = parseMetadataText(content);

    const records = new Map<string, MetadataRecord>();
    for (const record of parsed) {
      const name = record.group.toUpperCase();
      if (records.has(name)) {
        console.warn(
          `Duplicate metadata group ${record.group} in ${this._path};` +
            " keeping the last one",
        );
        // Re-inserting moves the group to its latest position.
        records.delete(name);
      }
      records.set(name, record);
    }

    this.records = records;
  }

  /** Drop all parsed records. */
  clear(): void {
    this.records = new Map();
  }

  has(group: string): boolean {
    return this.records.has(group.toUpperCase());
  }

  /**
   * Look up a whole group, or one of its values, ignoring case.
   *
   * Missing groups and keys resolve to `fallback` (`undefined` by default);
   * this method never throws for them.
   */
  get(group: string, key?: undefined): MetadataRecord | undefined;
  get<D>(group: string, key: undefined, fallback: D): MetadataRecord | D;
  get(group: string, key: string): MetadataValue | undefined;
  get<D>(group: string, key: string, fallback: D): MetadataValue | D;
  get(group: string, key?: string, fallback?: unknown): unknown {
    const record = this.records.get(group.toUpperCase());
    if (record === undefined) return fallback;
    if (key === undefined) return record;
    return record.get(key) ?? fallback;
  }

  /**
   * The (key, value) pairs of `group`, without the `GROUP` key itself.
   *
   * A missing group is reported as the error variant rather than thrown.
   */
  groupEntries(group: string): GroupResult {
    const record = this.get(group);
    if (record === undefined) {
      return { ok: false, error: new GroupError(group) };
    }
    const entries = Array.from(record.entries()).filter(
      ([key]) => key !== "GROUP",
    );
    return { ok: true, entries };
  }

  /**
   * Iterate the (key, value) pairs of `group`, without the `GROUP` key.
   *
   * Each call returns a fresh iterable.
   *
   * @throws {GroupError} if the group does not exist.
   */
  iterGroup(group: string): Iterable<[string, MetadataValue]> {
    const result = this.groupEntries(group);
    if (!result.ok) {
      throw result.error;
    }
    return result.entries;
  }

  toJSON(): Record<string, Record<string, MetadataValue>> {
    const out: Record<string, Record<string, MetadataValue>> = {};
    for (const [name, record] of this.records) {
      out[name] = record.toJSON();
    }
    return out;
  }

  toString(): string {
    return `LandsatMetadata(${this._path})`;
  }

  private static checkPath(path: string): string {
    if (extname(path).toLowerCase() !== ".txt") {
      throw new MetadataFileError(`${path} should be a "*.txt" file`);
    }
    return path;
  }
}
