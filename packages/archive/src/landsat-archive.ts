import type { Stats } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { LandsatMetadata } from "@landsat-archive/mtl";
import { withContainer } from "./archive-opener.js";
import type { BandMap, BandMapping } from "./band-map.js";
import { BAND_MAP, dispatchMapping } from "./band-map.js";
import type { BandFileIndex } from "./bands.js";
import { buildBandIndex } from "./bands.js";
import { detectArchiveFormat } from "./detect.js";
import { BandNotFoundError, UnsupportedSourceError } from "./errors.js";
import type { BandRaster, RasterOpener } from "./raster.js";
import { openGeoTIFF } from "./raster.js";
import type { MetadataTemplate } from "./sniff.js";
import { DEFAULT_METADATA_TEMPLATE, findMetadataEntry } from "./sniff.js";

export interface ReadOptions {
  /**
   * Where to extract a compressed archive. Defaults to a sibling directory
   * named after the archive's file name up to its first `.`.
   */
  extractTo?: string;

  /** A free-form label for the archive. */
  alias?: string;

  /** Pattern matched against base names to find the metadata file. */
  metadataTemplate?: MetadataTemplate;

  /** Band table consulted to map aliases to band codes. */
  bandMap?: BandMap;

  /** Opens band files for {@link LandsatArchive.open}. */
  opener?: RasterOpener;
}

type ResolvedOptions = Required<Omit<ReadOptions, "extractTo">> &
  Pick<ReadOptions, "extractTo">;

function withDefaults({
  extractTo,
  alias = "DEFAULT",
  metadataTemplate = DEFAULT_METADATA_TEMPLATE,
  bandMap = BAND_MAP,
  opener = openGeoTIFF,
}: ReadOptions): ResolvedOptions {
  return { extractTo, alias, metadataTemplate, bandMap, opener };
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/** The default extraction directory for the archive at `path`. */
export function defaultExtractPath(path: string): string {
  const stem = basename(path).split(".")[0] ?? "";
  return join(dirname(path), stem);
}

/**
 * A Landsat scene: its base directory, parsed metadata, band mapping and the
 * band file index.
 *
 * Only constructed through {@link LandsatArchive.read} and the `from*`
 * factories, which either return a complete archive or throw.
 *
 * ```ts
 * const scene = await LandsatArchive.read("/data/LC08_L1TP_001002.tar.gz");
 * scene.band("red"); // "LC08_L1TP_001002_B4.TIF"
 * const raster = await scene.open("red");
 * ```
 */
export class LandsatArchive {
  /** Directory the band file names are relative to. */
  readonly src: string;
  readonly alias: string;
  readonly metadata: LandsatMetadata;
  /** Aliases to band codes for this scene's spacecraft and sensor. */
  readonly mapping: BandMapping;
  /** Band codes to file names, from `FILE_NAME_BAND_*` keys. */
  readonly bands: BandFileIndex;
  private readonly opener: RasterOpener;

  private constructor(
    src: string,
    metadata: LandsatMetadata,
    mapping: BandMapping,
    bands: BandFileIndex,
    { alias, opener }: ResolvedOptions,
  ) {
    this.src = src;
    this.metadata = metadata;
    this.mapping = mapping;
    this.bands = bands;
    this.alias = alias;
    this.opener = opener;
  }

  /**
   * Resolve a directory, metadata file or compressed archive into a scene.
   *
   * Archives are recognised by content, not by extension.
   *
   * @throws {UnsupportedSourceError} if `source` is none of the above.
   */
  static async read(
    source: string,
    options: ReadOptions = {},
  ): Promise<LandsatArchive> {
    const path = resolve(source);
    const info = await statOrNull(path);

    if (info?.isDirectory()) {
      return await LandsatArchive.fromDirectory(path, options);
    }
    if (info?.isFile()) {
      if (extname(path).toLowerCase() === ".txt") {
        return await LandsatArchive.fromMetadataFile(path, options);
      }
      if ((await detectArchiveFormat(path)) !== null) {
        return await LandsatArchive.fromArchive(path, options);
      }
    }

    throw new UnsupportedSourceError(`${source} is not supported.`);
  }

  /**
   * Read a scene from a directory holding its metadata and band files.
   *
   * The first listed entry matching the metadata template is used.
   */
  static async fromDirectory(
    directory: string,
    options: ReadOptions = {},
  ): Promise<LandsatArchive> {
    const resolved = withDefaults(options);
    const names = await readdir(directory);
    const metaFile = findMetadataEntry(names, resolved.metadataTemplate);
    return await LandsatArchive.load(
      directory,
      join(directory, metaFile),
      resolved,
    );
  }

  /** Read a scene from its metadata file; bands sit next to it. */
  static async fromMetadataFile(
    metadataPath: string,
    options: ReadOptions = {},
  ): Promise<LandsatArchive> {
    return await LandsatArchive.load(
      dirname(metadataPath),
      metadataPath,
      withDefaults(options),
    );
  }

  /**
   * Extract a zip or tar archive and read the scene it contains.
   *
   * The metadata entry is located before anything is written. The archive
   * is closed on every exit path.
   */
  static async fromArchive(
    archivePath: string,
    options: ReadOptions = {},
  ): Promise<LandsatArchive> {
    const resolved = withDefaults(options);
    const destination = resolve(
      resolved.extractTo ?? defaultExtractPath(archivePath),
    );

    const entry = await withContainer(archivePath, async (container) => {
      const names = await container.list();
      const found = findMetadataEntry(names, resolved.metadataTemplate);
      await container.extractAll(destination);
      return found;
    });

    const metadataPath = join(destination, entry);
    return await LandsatArchive.load(
      dirname(metadataPath),
      metadataPath,
      resolved,
    );
  }

  private static async load(
    src: string,
    metadataPath: string,
    options: ResolvedOptions,
  ): Promise<LandsatArchive> {
    const metadata = new LandsatMetadata(metadataPath);
    await metadata.parse();

    const mapping = dispatchMapping(metadata, options.bandMap);
    const bands = buildBandIndex(metadata);

    return new LandsatArchive(src, metadata, mapping, bands, options);
  }

  /**
   * The file name of a band, by band code (`4`, `"QUALITY"`) or by alias
   * (`"red"`).
   *
   * Band codes are tried first.
   *
   * @throws {BandNotFoundError} if neither lookup finds a file.
   */
  band(id: string | number): string {
    const key = String(id);

    const direct = this.bands.get(key);
    if (direct !== undefined) return direct;

    const code = Object.hasOwn(this.mapping, key)
      ? this.mapping[key]
      : undefined;
    const aliased = code === undefined ? undefined : this.bands.get(code);
    if (aliased !== undefined) return aliased;

    throw new BandNotFoundError(key);
  }

  /** Absolute path of a band file. See {@link band}. */
  bandPath(id: string | number): string {
    return resolve(this.src, this.band(id));
  }

  /** Open a band with the configured {@link RasterOpener}. */
  async open(id: string | number): Promise<BandRaster> {
    return await this.opener(this.bandPath(id));
  }

  toString(): string {
    return `LandsatArchive(${this.src}, ${this.metadata}, ${this.alias})`;
  }
}
