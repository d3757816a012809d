/**
 * Type-indexed heterogeneous store.
 *
 * Each slot is addressed by a runtime identity that carries a static type:
 * either a {@link TypeKey} made with {@link createKey}, or a class
 * constructor for values that are instances of that class. One slot per
 * key; absent slots read as `undefined`.
 */

/** Any class, abstract or not, used as the key for its own instances. */
export type Constructor<T> = abstract new (...args: never[]) => T;

export type Key<T> = TypeKey<T> | Constructor<T>;

/**
 * Runtime identity for one typed slot.
 *
 * Values live inside the key, indexed by the owning map, so reading a slot
 * hands back exactly the type it was written with.
 *
 * @example
 * ```typescript
 * interface Session { userId: string }
 * const SessionKey = createKey<Session>("session");
 *
 * ctx.store.set(SessionKey, { userId: "u-1" });
 * ctx.store.get(SessionKey)?.userId; // "u-1"
 * ```
 */
export class TypeKey<T> {
  private readonly slots = new WeakMap<object, { value: T }>();

  constructor(readonly description: string) {}

  /** @internal */
  read(owner: object): T | undefined {
    return this.slots.get(owner)?.value;
  }

  /** @internal */
  holds(owner: object): boolean {
    return this.slots.has(owner);
  }

  /** @internal */
  write(owner: object, value: T): void {
    this.slots.set(owner, { value });
  }

  /** @internal */
  erase(owner: object): T | undefined {
    const slot = this.slots.get(owner);
    this.slots.delete(owner);
    return slot?.value;
  }

  toString(): string {
    return `TypeKey(${this.description})`;
  }
}

export function createKey<T>(description: string): TypeKey<T> {
  return new TypeKey<T>(description);
}

export interface ReadonlyTypeMap {
  readonly size: number;
  get<T>(key: Key<T>): T | undefined;
  has<T>(key: Key<T>): boolean;
}

export class TypeMap implements ReadonlyTypeMap {
  private readonly keys = new Set<TypeKey<unknown>>();
  private readonly instances = new Map<Constructor<unknown>, unknown>();
  private frozen = false;

  get size(): number {
    return this.keys.size + this.instances.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Store a value, overwriting whatever the slot held.
   */
  set<T>(key: Key<T>, value: T): this {
    this.assertWritable();
    if (key instanceof TypeKey) {
      key.write(this, value);
      this.keys.add(key);
    } else {
      this.instances.set(key, value);
    }
    return this;
  }

  get<T>(key: Key<T>): T | undefined {
    if (key instanceof TypeKey) {
      return key.read(this);
    }
    const value = this.instances.get(key);
    return value instanceof key ? value : undefined;
  }

  has<T>(key: Key<T>): boolean {
    return key instanceof TypeKey ? key.holds(this) : this.instances.has(key);
  }

  /**
   * Empty a slot.
   *
   * @returns The value it held, if any.
   */
  remove<T>(key: Key<T>): T | undefined {
    this.assertWritable();
    if (key instanceof TypeKey) {
      this.keys.delete(key);
      return key.erase(this);
    }
    const value = this.get(key);
    this.instances.delete(key);
    return value;
  }

  clear(): void {
    this.assertWritable();
    for (const key of this.keys) {
      key.erase(this);
    }
    this.keys.clear();
    this.instances.clear();
  }

  /**
   * Make the map read-only. Used for application data shared by every
   * request.
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  private assertWritable(): void {
    if (this.frozen) {
      throw new TypeError("TypeMap is frozen");
    }
  }
}
