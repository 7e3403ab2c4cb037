import { castToBest, type TypedValue } from "./cast.js";
import { ParsingError } from "./errors.js";
import type { RawGroup } from "./lexer.js";
import { MetadataRecord } from "./record.js";

const KEY_VALUE = /^(?<key>.+)\s=\s(?<value>.+)/;

/**
 * Turn raw groups into metadata records.
 *
 * Lines that are not `key = value` statements are skipped. A group that
 * yields no more than one pair (only its `GROUP` line) is dropped.
 *
 * @throws {ParsingError} if no group produced a record.
 */
export function parser(groups: Iterable<RawGroup>): MetadataRecord[] {
  const records: MetadataRecord[] = [];

  for (const group of groups) {
    const fields = new Map<string, TypedValue>();

    for (const line of group) {
      const match = KEY_VALUE.exec(line);
      const key = match?.groups?.key;
      const value = match?.groups?.value;
      if (key === undefined || value === undefined) continue;

      if (fields.has(key)) {
        console.warn(`Duplicate metadata key ${key}; keeping the last value`);
      }
      fields.set(key, castToBest(value));
    }

    if (fields.size > 1 && fields.has("GROUP")) {
      records.push(new MetadataRecord(fields));
    }
  }

  if (records.length === 0) {
    throw new ParsingError("Empty metadata file: no metadata found");
  }

  return records;
}
