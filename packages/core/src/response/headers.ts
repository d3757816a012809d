/**
 * Ordered header list. Names keep the case they were added with and
 * compare case-insensitively; duplicates are allowed.
 */
export class HeaderList implements Iterable<[string, string]> {
  private readonly entries: Array<[string, string]> = [];

  constructor(
    init?: Iterable<readonly [string, string]> | Record<string, string>,
  ) {
    if (!init) return;
    const pairs = isIterable(init) ? init : Object.entries(init);
    for (const [name, value] of pairs) {
      this.append(name, value);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Add a header, keeping any existing one with the same name.
   */
  append(name: string, value: string): this {
    this.entries.push([name, value]);
    return this;
  }

  /**
   * Replace every header with this name by a single one.
   */
  set(name: string, value: string): this {
    this.delete(name);
    return this.append(name, value);
  }

  /**
   * First value for a name.
   */
  get(name: string): string | undefined {
    const lower = name.toLowerCase();
    return this.entries.find(([key]) => key.toLowerCase() === lower)?.[1];
  }

  getAll(name: string): string[] {
    const lower = name.toLowerCase();
    return this.entries
      .filter(([key]) => key.toLowerCase() === lower)
      .map(([, value]) => value);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  delete(name: string): this {
    const lower = name.toLowerCase();
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i][0].toLowerCase() === lower) {
        this.entries.splice(i, 1);
      }
    }
    return this;
  }

  /**
   * Copy headers from another list whose names are not present here.
   */
  inherit(other: HeaderList): this {
    const missing = new Set<string>();
    for (const [name] of other) {
      if (!this.has(name)) missing.add(name.toLowerCase());
    }
    for (const [name, value] of other) {
      if (missing.has(name.toLowerCase())) this.append(name, value);
    }
    return this;
  }

  clone(): HeaderList {
    return new HeaderList(this.entries);
  }

  toArray(): Array<[string, string]> {
    return this.entries.map(([name, value]) => [name, value]);
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries[Symbol.iterator]();
  }
}

function isIterable(
  value: Iterable<readonly [string, string]> | Record<string, string>,
): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
