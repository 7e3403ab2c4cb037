import { basename } from "node:path";
import { MetadataFileError } from "@landsat-archive/mtl";

/** A metadata file name pattern, as a RegExp or as a regex source string. */
export type MetadataTemplate = string | RegExp;

/** Matches `<anything>MTL.txt`, optionally with an underscore, in any case. */
export const DEFAULT_METADATA_TEMPLATE = /^.*_?MTL\.txt$/i;

function compile(template: MetadataTemplate): RegExp {
  if (typeof template === "string") {
    // Anchored at the start only, like a prefix match.
    return new RegExp(`^(?:${template})`, "i");
  }
  // A global or sticky RegExp keeps `lastIndex` between tests.
  return new RegExp(template.source, template.flags.replace(/[gy]/g, ""));
}

/**
 * Find the first entry whose base name matches `template`.
 *
 * Returns the entry as listed, directory components included.
 *
 * @throws {MetadataFileError} if nothing matches.
 */
export function findMetadataEntry(
  names: Iterable<string>,
  template: MetadataTemplate = DEFAULT_METADATA_TEMPLATE,
): string {
  const regex = compile(template);
  const seen: string[] = [];

  for (const name of names) {
    if (regex.test(basename(name))) {
      return name;
    }
    seen.push(name);
  }

  throw new MetadataFileError(
    `Missing Landsat metadata file in [${seen.join(", ")}]`,
  );
}

/**
 * Find the base name of the first entry matching `template`.
 *
 * ```ts
 * metadataSniffer(["foo", "bar", "foo/bar/landsat_mtl.txt"], ".+_mtl.txt");
 * // "landsat_mtl.txt"
 * ```
 *
 * @throws {MetadataFileError} if nothing matches.
 */
export function metadataSniffer(
  names: Iterable<string>,
  template: MetadataTemplate = DEFAULT_METADATA_TEMPLATE,
): string {
  return basename(findMetadataEntry(names, template));
}
