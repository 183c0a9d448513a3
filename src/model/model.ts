/**
 * Dynamic-attribute data model
 *
 * Wraps a mapping so its keys read and write like properties
 * (`project.name`, `project.metadata.version`). Nested plain objects become
 * models; key order is the insertion order of the source mapping.
 *
 * Keys that collide with a member of the class (`get`, `keys`, `size`, ...)
 * resolve to the member; reach such data through `get`/`set`.
 */

export type ModelRow = Record<string, unknown>;

/**
 * Display formatter for one column of a model in table output
 */
export type ColumnFormatter = (value: unknown) => unknown;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Plain copy of a value: models become dicts, arrays and plain objects are copied
 */
export function toPlain(value: unknown): unknown {
  if (value instanceof Model) {
    return value.toDict();
  }
  if (Array.isArray(value)) {
    return value.map(toPlain);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toPlain(v)]));
  }
  return value;
}

function deepCopy(value: unknown): unknown {
  if (value instanceof Model) {
    return value.deepClone();
  }
  if (Array.isArray(value)) {
    return value.map(deepCopy);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, deepCopy(v)]));
  }
  return value;
}

function wrap(value: unknown, removedKeys: readonly string[]): unknown {
  if (isPlainObject(value)) {
    return new Model(value, removedKeys);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => (isPlainObject(item) ? new Model(item, removedKeys) : item));
  }
  return value;
}

function repr(value: unknown): string {
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  if (value instanceof Model) {
    return value.inspect();
  }
  if (value === undefined) {
    return 'undefined';
  }
  return JSON.stringify(toPlain(value)) ?? String(value);
}

// Symbol keys keep internal state apart from row keys
const DATA = Symbol('data');
const FORMATTERS = Symbol('formatters');
const REMOVED_KEYS = Symbol('removedKeys');

export class Model {
  [key: string]: unknown;

  /**
   * Keys dropped (at every depth) when no explicit list is passed to the constructor
   */
  static excludedKeys: readonly string[] = [];

  private readonly [DATA] = new Map<string, unknown>();
  private readonly [FORMATTERS] = new Map<string, ColumnFormatter>();
  private readonly [REMOVED_KEYS]: readonly string[];

  constructor(row: ModelRow = {}, keysToRemove?: readonly string[]) {
    const removedKeys = keysToRemove ?? new.target.excludedKeys;
    this[REMOVED_KEYS] = removedKeys;

    for (const [key, value] of Object.entries(row)) {
      if (removedKeys.includes(key)) continue;
      this[DATA].set(key, wrap(value, removedKeys));
    }

    return new Proxy(this, {
      get: (target, prop, receiver) => {
        if (typeof prop === 'string' && !(prop in target) && target[DATA].has(prop)) {
          return target[DATA].get(prop);
        }
        return Reflect.get(target, prop, receiver);
      },
      set: (target, prop, value, receiver) => {
        if (typeof prop === 'string' && !(prop in target)) {
          target[DATA].set(prop, value);
          return true;
        }
        return Reflect.set(target, prop, value, receiver);
      },
      has: (target, prop) => {
        return (typeof prop === 'string' && target[DATA].has(prop)) || Reflect.has(target, prop);
      },
      deleteProperty: (target, prop) => {
        if (typeof prop === 'string' && !(prop in target) && target[DATA].has(prop)) {
          return target[DATA].delete(prop);
        }
        return Reflect.deleteProperty(target, prop);
      },
    });
  }

  /**
   * Value for a key, or the default when the key is absent
   */
  get(key: string, defaultValue?: unknown): unknown {
    return this[DATA].has(key) ? this[DATA].get(key) : defaultValue;
  }

  /**
   * Set a value; new keys are appended to the key order
   */
  set(key: string, value: unknown): this {
    this[DATA].set(key, value);
    return this;
  }

  has(key: string): boolean {
    return this[DATA].has(key);
  }

  delete(key: string): boolean {
    return this[DATA].delete(key);
  }

  keys(): string[] {
    return [...this[DATA].keys()];
  }

  values(): unknown[] {
    return [...this[DATA].values()];
  }

  entries(): Array<[string, unknown]> {
    return [...this[DATA].entries()];
  }

  [Symbol.iterator](): IterableIterator<[string, unknown]> {
    return this[DATA].entries();
  }

  get size(): number {
    return this[DATA].size;
  }

  /**
   * Plain object with nested models and arrays converted recursively
   */
  toDict(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of this[DATA]) {
      result[key] = toPlain(value);
    }
    return result;
  }

  toJSON(): Record<string, unknown> {
    return this.toDict();
  }

  /**
   * `key=value key2=value2 ...`
   */
  currentState(): string {
    return this.entries()
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(' ');
  }

  toString(): string {
    return `#<${this.constructor.name} ${this.currentState()}>`;
  }

  /**
   * Developer-facing summary showing the first three fields
   */
  inspect(): string {
    const shown = this.entries()
      .slice(0, 3)
      .map(([key, value]) => `${key}=${repr(value)}`);
    if (this.size > 3) {
      shown.push('...');
    }
    return `${this.constructor.name}(${shown.join(', ')})`;
  }

  /**
   * Shallow copy: same values, same formatters, same class
   */
  clone(): Model {
    const copy = this.emptyCopy();
    for (const [key, value] of this[DATA]) {
      copy[DATA].set(key, value);
    }
    for (const [key, formatter] of this[FORMATTERS]) {
      copy[FORMATTERS].set(key, formatter);
    }
    return copy;
  }

  /**
   * Deep copy: nested models, arrays and plain objects are copied too
   */
  deepClone(): Model {
    const copy = this.emptyCopy();
    for (const [key, value] of this[DATA]) {
      copy[DATA].set(key, deepCopy(value));
    }
    for (const [key, formatter] of this[FORMATTERS]) {
      copy[FORMATTERS].set(key, formatter);
    }
    return copy;
  }

  /**
   * Subclasses with a different constructor signature must override this.
   */
  protected emptyCopy(): Model {
    const copy: unknown = Reflect.construct(this.constructor, [{}, this[REMOVED_KEYS]]);
    if (!(copy instanceof Model)) {
      throw new TypeError(`${this.constructor.name} did not construct a Model`);
    }
    return copy;
  }

  /**
   * Validation messages; empty when valid. Subclasses add their own rules.
   */
  validate(): string[] {
    return [];
  }

  isValid(): boolean {
    return this.validate().length === 0;
  }

  /**
   * Register a display formatter for a column; applied by table output
   */
  formatColumn(key: string, formatter: ColumnFormatter): this {
    this[FORMATTERS].set(key, formatter);
    return this;
  }

  getFormatter(key: string): ColumnFormatter | undefined {
    return this[FORMATTERS].get(key);
  }
}
