/**
 * @footfall/core - Header Map
 *
 * Case-insensitive, read-only header collection. When a header appears more
 * than once the first value wins. An empty value is kept, so a header that is
 * present but empty is distinguishable from one that is absent.
 */

/** Shapes a host may hand over as request headers. */
export type HeaderInput =
  | HeaderMap
  | Record<string, string | readonly string[] | undefined>
  | Iterable<readonly [string, string]>
  | { forEach(callback: (value: string, key: string) => void): void };

export class HeaderMap {
  private readonly values: ReadonlyMap<string, string>;

  private constructor(values: Map<string, string>) {
    this.values = values;
  }

  /** An empty header map. */
  static empty(): HeaderMap {
    return new HeaderMap(new Map());
  }

  /**
   * Build a HeaderMap from any common header representation: a plain object
   * (Node / Express style, array values allowed), an iterable of pairs, or a
   * Fetch `Headers` instance.
   */
  static from(input: HeaderInput | undefined | null): HeaderMap {
    if (input instanceof HeaderMap) {
      return input;
    }

    const values = new Map<string, string>();
    const add = (key: string, value: string | readonly string[] | undefined): void => {
      const name = key.trim().toLowerCase();
      if (name === "" || values.has(name)) {
        return;
      }
      const first = typeof value === "string" ? value : value?.[0];
      if (first !== undefined) {
        values.set(name, first.trim());
      }
    };

    if (!input) {
      return new HeaderMap(values);
    }

    if (isForEachable(input)) {
      input.forEach((value, key) => add(key, value));
    } else if (isPairIterable(input)) {
      for (const [key, value] of input) {
        add(key, value);
      }
    } else {
      for (const [key, value] of Object.entries(input)) {
        add(key, value);
      }
    }

    return new HeaderMap(values);
  }

  /** Value of a header, or undefined when absent. */
  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase());
  }

  /** Value of a header, or undefined when absent or empty. */
  getNonEmpty(name: string): string | undefined {
    const value = this.get(name);
    return value === undefined || value === "" ? undefined : value;
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  get size(): number {
    return this.values.size;
  }

  /** Lower-cased header names with their values. */
  entries(): IterableIterator<[string, string]> {
    return this.values.entries();
  }

  /** Plain-object copy, for logging and serialization. */
  toJSON(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}

function isForEachable(
  input: object,
): input is { forEach(callback: (value: string, key: string) => void): void } {
  return (
    "forEach" in input &&
    typeof input.forEach === "function" &&
    !Array.isArray(input) &&
    !(input instanceof Map)
  );
}

function isPairIterable(input: object): input is Iterable<readonly [string, string]> {
  return Symbol.iterator in input;
}
