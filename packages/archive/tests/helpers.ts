import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { LandsatMetadata } from "@landsat-archive/mtl";
import JSZip from "jszip";
import * as tar from "tar";

// ── Metadata text ───────────────────────────────────────────────────────

export interface SceneOptions {
  spacecraft?: string | null;
  sensor?: string | null;
  /** Band codes to file names, written as FILE_NAME_BAND_<code>. */
  bands?: Record<string, string>;
}

/** Render a small MTL document for one scene. */
export function mtlText({
  spacecraft = "LANDSAT_8",
  sensor = "OLI_TIRS",
  bands = { "4": "scene_B4.TIF" },
}: SceneOptions = {}): string {
  const product = ["  GROUP = PRODUCT_METADATA", '    DATA_TYPE = "L1T"'];
  if (spacecraft !== null) product.push(`    SPACECRAFT_ID = "${spacecraft}"`);
  if (sensor !== null) product.push(`    SENSOR_ID = "${sensor}"`);
  for (const [code, name] of Object.entries(bands)) {
    product.push(`    FILE_NAME_BAND_${code} = "${name}"`);
  }
  product.push("  END_GROUP = PRODUCT_METADATA");

  return [
    "GROUP = L1_METADATA_FILE",
    "  GROUP = METADATA_FILE_INFO",
    '    ORIGIN = "test fixture"',
    "  END_GROUP = METADATA_FILE_INFO",
    ...product,
    "END_GROUP = L1_METADATA_FILE",
    "END",
    "",
  ].join("\n");
}

/** A parsed metadata store backed by in-memory text. */
export async function parsedMetadata(
  options: SceneOptions = {},
): Promise<LandsatMetadata> {
  const content = mtlText(options);
  const meta = new LandsatMetadata("stub_MTL.txt", {
    readText: async () => content,
  });
  await meta.parse();
  return meta;
}

// ── Temporary files ─────────────────────────────────────────────────────

/** Create an empty temporary directory. */
export async function tempDir(): Promise<string> {
  return await mkdtemp(join(tmpdir(), "landsat-archive-"));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/** Write `files` (relative name to content) below `root`. */
export async function writeFiles(
  root: string,
  files: Record<string, string>,
): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const target = join(root, name);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

/** Write a zip archive holding `files` to `path`. */
export async function writeZip(
  path: string,
  files: Record<string, string>,
): Promise<void> {
  const zip = new JSZip();
  for (const [name, content] of Object.entries(files)) {
    zip.file(name, content);
  }
  await writeFile(path, await zip.generateAsync({ type: "nodebuffer" }));
}

/**
 * Write a tar archive holding `files` to `path`.
 *
 * The files are staged in a scratch directory that is removed afterwards.
 */
export async function writeTar(
  path: string,
  files: Record<string, string>,
  { gzip = false }: { gzip?: boolean } = {},
): Promise<void> {
  const staging = await tempDir();
  try {
    await writeFiles(staging, files);
    await tar.create({ file: path, cwd: staging, gzip }, Object.keys(files));
  } finally {
    await removeDir(staging);
  }
}

/** Cut the last `bytes` bytes off the file at `path`. */
export async function truncateFile(path: string, bytes: number): Promise<void> {
  const data = await readFile(path);
  await writeFile(path, data.subarray(0, data.byteLength - bytes));
}
