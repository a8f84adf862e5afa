/**
 * Name/Value Collection
 *
 * Ordered list of `{ name, values }` entries used for request headers,
 * query string parameters and response headers. Names compare
 * case-insensitively and at most one entry exists per folded name.
 *
 * @module expectation/name-values
 */

export interface NameValues {
  name: string;
  values: string[];
}

function fold(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Split every value on commas, trim, drop empties.
 */
export function splitTokens(values: readonly string[]): string[] {
  const tokens: string[] = [];
  for (const value of values) {
    for (const part of value.split(',')) {
      const token = part.trim();
      if (token) tokens.push(token);
    }
  }
  return tokens;
}

/**
 * Parse comma-separated operator input ("a, b ,c") into values.
 */
export function parseCsvValues(input: string): string[] {
  return splitTokens([input]);
}

export class NameValueCollection implements Iterable<NameValues> {
  private readonly entries: NameValues[] = [];

  /**
   * Entries whose names differ only in case are folded into the first one,
   * values concatenated in input order.
   */
  constructor(entries: Iterable<NameValues> = []) {
    for (const entry of entries) {
      this.merge(entry.name, entry.values);
    }
  }

  /**
   * Build a collection from a `{ name: values }` record, in key order.
   */
  static fromRecord(record: Record<string, string | string[]>): NameValueCollection {
    const collection = new NameValueCollection();
    for (const [name, value] of Object.entries(record)) {
      collection.merge(name, Array.isArray(value) ? value : [value]);
    }
    return collection;
  }

  get size(): number {
    return this.entries.length;
  }

  private indexOf(name: string): number {
    const key = fold(name);
    return this.entries.findIndex((entry) => fold(entry.name) === key);
  }

  /**
   * Values for `name` (case-insensitive), or undefined when absent.
   * The returned array is a copy.
   */
  get(name: string): string[] | undefined {
    const index = this.indexOf(name);
    return index >= 0 ? [...this.entries[index].values] : undefined;
  }

  has(name: string): boolean {
    return this.indexOf(name) >= 0;
  }

  /**
   * First value of `name`, or undefined.
   */
  first(name: string): string | undefined {
    return this.get(name)?.[0];
  }

  /**
   * Replace the values of an existing entry in place (keeping its spelling
   * and position), or append a new entry.
   */
  upsert(name: string, values: readonly string[]): this {
    const index = this.indexOf(name);
    if (index >= 0) {
      this.entries[index].values = [...values];
    } else {
      this.entries.push({ name, values: [...values] });
    }
    return this;
  }

  /**
   * Add one value to an entry, creating the entry if needed.
   */
  append(name: string, value: string): this {
    const index = this.indexOf(name);
    if (index >= 0) {
      this.entries[index].values.push(value);
    } else {
      this.entries.push({ name, values: [value] });
    }
    return this;
  }

  /**
   * Add values to an entry, creating the entry if needed.
   */
  merge(name: string, values: readonly string[]): this {
    const index = this.indexOf(name);
    if (index >= 0) {
      this.entries[index].values.push(...values);
    } else {
      this.entries.push({ name, values: [...values] });
    }
    return this;
  }

  /**
   * Remove an entry; no-op when absent.
   */
  delete(name: string): boolean {
    const index = this.indexOf(name);
    if (index < 0) return false;
    this.entries.splice(index, 1);
    return true;
  }

  /**
   * Treat the entry as a comma-separated token set (e.g. `Vary`) and add
   * `token` unless an equal token (case-insensitive) is already present.
   * The entry is written back as a single `", "`-joined value.
   */
  mergeToken(name: string, token: string): this {
    const existing = this.get(name);
    if (!existing || existing.length === 0) {
      return this.upsert(name, [token]);
    }

    const seen = new Set<string>();
    const tokens: string[] = [];
    for (const part of splitTokens(existing)) {
      const key = part.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      tokens.push(part);
    }
    if (!seen.has(token.trim().toLowerCase())) {
      tokens.push(token.trim());
    }

    return this.upsert(name, [tokens.join(', ')]);
  }

  names(): string[] {
    return this.entries.map((entry) => entry.name);
  }

  /**
   * Deep copy of the entries.
   */
  toArray(): NameValues[] {
    return this.entries.map((entry) => ({ name: entry.name, values: [...entry.values] }));
  }

  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const entry of this.entries) {
      record[entry.name] = [...entry.values];
    }
    return record;
  }

  clone(): NameValueCollection {
    return new NameValueCollection(this.toArray());
  }

  toJSON(): NameValues[] {
    return this.toArray();
  }

  *[Symbol.iterator](): Iterator<NameValues> {
    for (const entry of this.toArray()) {
      yield entry;
    }
  }
}
