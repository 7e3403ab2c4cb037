import { mkdir } from "node:fs/promises";
import { resolve } from "node:path";
import * as tar from "tar";
import type { ArchiveContainer } from "./container.js";
import { UnsupportedSourceError } from "./errors.js";

/**
 * A tar archive, plain or gzip-compressed.
 *
 * Entries are streamed from disk on each call; `tar` refuses entries that
 * would be written outside the destination.
 */
export class TarContainer implements ArchiveContainer {
  readonly path: string;
  private closed = false;

  constructor(path: string) {
    this.path = path;
  }

  async list(): Promise<string[]> {
    this.checkOpen();
    const names: string[] = [];
    await this.unpack(
      tar.list({
        file: this.path,
        onReadEntry: (entry) => {
          names.push(entry.path);
        },
      }),
    );
    return names;
  }

  async extractAll(destination: string): Promise<void> {
    this.checkOpen();
    const root = resolve(destination);
    await mkdir(root, { recursive: true });
    await this.unpack(tar.extract({ file: this.path, cwd: root }));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** Report a broken or truncated archive as an unsupported source. */
  private async unpack(pending: Promise<void>): Promise<void> {
    try {
      await pending;
    } catch (cause) {
      const message = `Unsupported archive file ${this.path}`;
      throw new UnsupportedSourceError(message, { cause });
    }
  }

  private checkOpen(): void {
    if (this.closed) {
      throw new Error(`Tar archive ${this.path} is closed`);
    }
  }
}
