import { open } from "node:fs/promises";
import { constants, gunzipSync } from "node:zlib";

/** Container formats that can be opened as an {@link ArchiveContainer}. */
export type ArchiveFormat = "zip" | "tar";

const SNIFF_SIZE = 4096;
const TAR_BLOCK = 512;
const CHECKSUM_OFFSET = 148;
const CHECKSUM_LENGTH = 8;

// Local file header, empty archive, spanned archive.
const ZIP_SIGNATURES = [
  [0x50, 0x4b, 0x03, 0x04],
  [0x50, 0x4b, 0x05, 0x06],
  [0x50, 0x4b, 0x07, 0x08],
];
const GZIP_SIGNATURE = [0x1f, 0x8b];

function startsWith(bytes: Uint8Array, signature: number[]): boolean {
  return signature.every((byte, i) => bytes[i] === byte);
}

/**
 * Whether `block` starts with a valid tar header.
 *
 * The header checksum is the byte sum of the 512-byte header with the
 * checksum field itself read as spaces.
 */
export function isTarHeader(block: Uint8Array): boolean {
  if (block.byteLength < TAR_BLOCK) return false;

  const field = new TextDecoder()
    .decode(block.subarray(CHECKSUM_OFFSET, CHECKSUM_OFFSET + CHECKSUM_LENGTH))
    .replace(/[\0 ]+$/g, "")
    .trim();
  if (!/^[0-7]+$/.test(field)) return false;
  const expected = Number.parseInt(field, 8);

  let sum = 0;
  for (let i = 0; i < TAR_BLOCK; i++) {
    const inField =
      i >= CHECKSUM_OFFSET && i < CHECKSUM_OFFSET + CHECKSUM_LENGTH;
    sum += inField ? 0x20 : (block[i] ?? 0);
  }
  return sum === expected;
}

/** Decompress as much of a truncated gzip stream as the bytes allow. */
function gunzipHead(bytes: Uint8Array): Uint8Array | null {
  try {
    return gunzipSync(bytes, { finishFlush: constants.Z_SYNC_FLUSH });
  } catch (err) {
    if (err instanceof Error && "code" in err) {
      // zlib rejected the stream, so it is not a gzip-wrapped tar.
      return null;
    }
    throw err;
  }
}

/** Classify the leading bytes of a file as a container format. */
export function sniffArchiveFormat(head: Uint8Array): ArchiveFormat | null {
  if (ZIP_SIGNATURES.some((signature) => startsWith(head, signature))) {
    return "zip";
  }
  if (startsWith(head, GZIP_SIGNATURE)) {
    const inflated = gunzipHead(head);
    return inflated !== null && isTarHeader(inflated) ? "tar" : null;
  }
  return isTarHeader(head) ? "tar" : null;
}

/**
 * Detect the container format of the file at `path` from its content.
 *
 * File extensions are not consulted. Returns `null` for anything that is
 * neither zip nor (optionally gzip-compressed) tar.
 */
export async function detectArchiveFormat(
  path: string,
): Promise<ArchiveFormat | null> {
  const handle = await open(path, "r");
  try {
    const head = new Uint8Array(SNIFF_SIZE);
    const { bytesRead } = await handle.read(head, 0, SNIFF_SIZE, 0);
    return sniffArchiveFormat(head.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}
