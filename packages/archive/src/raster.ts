import type { FileHandle } from "node:fs/promises";
import { open } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import type { Source, TiffImage } from "@cogeotiff/core";
import { Tiff } from "@cogeotiff/core";

/** An opened band image. */
export interface BandRaster {
  /** Absolute path of the band file. */
  readonly path: string;

  /** Image width in pixels. */
  readonly width: number;

  /** Image height in pixels. */
  readonly height: number;

  close(): Promise<void>;
}

/** Opens the band file at an absolute path, read only. */
export type RasterOpener = (path: string) => Promise<BandRaster>;

/**
 * File-backed Source for @cogeotiff/core.
 *
 * Serves byte-range fetches straight from an open file handle.
 */
export class FileSource implements Source {
  readonly url: URL;
  readonly path: string;
  private handle: Promise<FileHandle> | null = null;

  constructor(path: string) {
    this.path = path;
    this.url = pathToFileURL(path);
  }

  async fetch(offset: number, length?: number): Promise<ArrayBuffer> {
    const handle = await this.open();
    const size = length ?? (await handle.stat()).size - offset;
    const buffer = new ArrayBuffer(Math.max(size, 0));
    const { bytesRead } = await handle.read(
      new Uint8Array(buffer),
      0,
      buffer.byteLength,
      offset,
    );
    return bytesRead === buffer.byteLength
      ? buffer
      : buffer.slice(0, bytesRead);
  }

  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle !== null) {
      await (await handle).close();
    }
  }

  private open(): Promise<FileHandle> {
    if (this.handle === null) {
      this.handle = open(this.path, "r");
    }
    return this.handle;
  }
}

/** A band GeoTIFF opened with @cogeotiff/core. */
export class GeoTIFFBand implements BandRaster {
  readonly path: string;
  readonly tiff: Tiff;
  private readonly source: FileSource;

  private constructor(source: FileSource, tiff: Tiff) {
    this.path = source.path;
    this.source = source;
    this.tiff = tiff;
  }

  static async open(path: string): Promise<GeoTIFFBand> {
    const source = new FileSource(path);
    try {
      const tiff = await Tiff.create(source);
      if (tiff.images.length === 0) {
        throw new Error(`${path} does not contain any IFDs`);
      }
      return new GeoTIFFBand(source, tiff);
    } catch (err) {
      await source.close();
      throw err;
    }
  }

  get width(): number {
    return this.primary().size.width;
  }

  get height(): number {
    return this.primary().size.height;
  }

  async close(): Promise<void> {
    await this.source.close();
  }

  private primary(): TiffImage {
    const image = this.tiff.images[0];
    if (image === undefined) {
      throw new Error(`${this.path} does not contain any IFDs`);
    }
    return image;
  }
}

/** The default {@link RasterOpener}: opens the band as a GeoTIFF. */
export const openGeoTIFF: RasterOpener = (path) => GeoTIFFBand.open(path);
