/**
 * Ordered name → text bindings produced by a route match.
 *
 * Kept apart from the context's type-indexed store because many variables
 * share the same type.
 */
export class Variables implements Iterable<[string, string]> {
  private readonly bindings: ReadonlyMap<string, string>;

  constructor(bindings: Iterable<readonly [string, string]> = []) {
    this.bindings = new Map(bindings);
  }

  get size(): number {
    return this.bindings.size;
  }

  get(name: string): string | undefined {
    return this.bindings.get(name);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  /**
   * Parse a variable with the given function. Returns `undefined` when the
   * variable is absent or the parser throws.
   *
   * @example
   * ```typescript
   * const id = ctx.variables.parse("id", Number);
   * ```
   */
  parse<T>(name: string, parser: (text: string) => T): T | undefined {
    const text = this.bindings.get(name);
    if (text === undefined) return undefined;
    try {
      return parser(text);
    } catch {
      return undefined;
    }
  }

  keys(): IterableIterator<string> {
    return this.bindings.keys();
  }

  values(): IterableIterator<string> {
    return this.bindings.values();
  }

  entries(): IterableIterator<[string, string]> {
    return this.bindings.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.bindings.entries();
  }

  toObject(): Record<string, string> {
    const params: Record<string, string> = Object.create(null);
    for (const [name, text] of this.bindings) {
      params[name] = text;
    }
    return params;
  }
}

export const EMPTY_VARIABLES: Variables = new Variables();
