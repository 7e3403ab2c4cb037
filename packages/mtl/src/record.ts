import type { MetadataValue, TypedValue, ValueType } from "./cast.js";

/**
 * One parsed metadata group: an ordered, read-only mapping from key to typed
 * value.
 *
 * Keys keep the case they were written with. Lookups through {@link get},
 * {@link has} and {@link typeOf} ignore case.
 */
export class MetadataRecord implements Iterable<[string, MetadataValue]> {
  /** The value of the record's `GROUP` key. */
  readonly group: string;

  private readonly fields: ReadonlyMap<string, TypedValue>;
  private readonly index: ReadonlyMap<string, string>;

  constructor(fields: Iterable<readonly [string, TypedValue]>) {
    const map = new Map<string, TypedValue>();
    const index = new Map<string, string>();
    for (const [key, value] of fields) {
      map.set(key, value);
      index.set(key.toUpperCase(), key);
    }

    const group = map.get("GROUP");
    if (group === undefined) {
      throw new TypeError("A metadata record requires a GROUP key");
    }

    this.group = String(group.value);
    this.fields = map;
    this.index = index;
    Object.freeze(this);
  }

  /** Number of keys, `GROUP` included. */
  get size(): number {
    return this.fields.size;
  }

  /** Keys in the order they were written. */
  keys(): string[] {
    return Array.from(this.fields.keys());
  }

  has(key: string): boolean {
    return this.index.has(key.toUpperCase());
  }

  /** Look up a value, ignoring the case of `key`. */
  get(key: string): MetadataValue | undefined {
    return this.typed(key)?.value;
  }

  /** The type `key`'s value was read as, or `undefined` if absent. */
  typeOf(key: string): ValueType | undefined {
    return this.typed(key)?.type;
  }

  /** All (key, value) pairs in written order, `GROUP` included. */
  *entries(): Generator<[string, MetadataValue]> {
    for (const [key, typed] of this.fields) {
      yield [key, typed.value];
    }
  }

  [Symbol.iterator](): Iterator<[string, MetadataValue]> {
    return this.entries();
  }

  toJSON(): Record<string, MetadataValue> {
    return Object.fromEntries(this.entries());
  }

  private typed(key: string): TypedValue | undefined {
    const written = this.index.get(key.toUpperCase());
    return written === undefined ? undefined : this.fields.get(written);
  }
}
