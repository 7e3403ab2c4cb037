import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import JSZip from "jszip";
import type { ArchiveContainer } from "./container.js";
import { UnsupportedSourceError } from "./errors.js";

/**
 * Resolve `name` below `destination`, refusing entries that would land
 * outside of it.
 */
export function entryTarget(destination: string, name: string): string {
  const target = resolve(destination, name);
  const rel = relative(destination, target);
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new Error(`Archive entry ${name} escapes ${destination}`);
  }
  return target;
}

/** A zip archive, read fully into memory with JSZip. */
export class ZipContainer implements ArchiveContainer {
  readonly path: string;
  private zip: JSZip | null;

  private constructor(path: string, zip: JSZip) {
    this.path = path;
    this.zip = zip;
  }

  static async open(path: string): Promise<ZipContainer> {
    const data = await readFile(path);
    try {
      return new ZipContainer(path, await new JSZip().loadAsync(data));
    } catch (cause) {
      throw new UnsupportedSourceError(`Unsupported archive file ${path}`, {
        cause,
      });
    }
  }

  async list(): Promise<string[]> {
    return Object.keys(this.archive().files);
  }

  async extractAll(destination: string): Promise<void> {
    const root = resolve(destination);
    await mkdir(root, { recursive: true });

    for (const [name, entry] of Object.entries(this.archive().files)) {
      const target = entryTarget(root, name);
      if (entry.dir) {
        await mkdir(target, { recursive: true });
        continue;
      }
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, await this.read(entry));
    }
  }

  async close(): Promise<void> {
    this.zip = null;
  }

  private async read(entry: JSZip.JSZipObject): Promise<Buffer> {
    try {
      return await entry.async("nodebuffer");
    } catch (cause) {
      throw new UnsupportedSourceError(
        `Unreadable entry ${entry.name} in ${this.path}`,
        { cause },
      );
    }
  }

  private archive(): JSZip {
    if (this.zip === null) {
      throw new Error(`Zip archive ${this.path} is closed`);
    }
    return this.zip;
  }
}
