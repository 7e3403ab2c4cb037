import type { ArchiveContainer } from "./container.js";
import { detectArchiveFormat } from "./detect.js";
import { UnsupportedSourceError } from "./errors.js";
import { TarContainer } from "./tar.js";
import { ZipContainer } from "./zip.js";

/**
 * Open `path` with the container implementation matching its content.
 *
 * @throws {UnsupportedSourceError} if the content is neither zip nor tar.
 */
export async function openContainer(path: string): Promise<ArchiveContainer> {
  const format = await detectArchiveFormat(path);
  switch (format) {
    case "zip":
      return await ZipContainer.open(path);
    case "tar":
      return new TarContainer(path);
    case null:
      throw new UnsupportedSourceError(`Unsupported archive file ${path}`);
  }
}

/**
 * Open the archive at `path`, run `fn` with it and close it afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withContainer<T>(
  path: string,
  fn: (container: ArchiveContainer) => Promise<T>,
): Promise<T> {
  const container = await openContainer(path);
  try {
    return await fn(container);
  } finally {
    await container.close();
  }
}
