// src/utils/headerList.ts
import { RequestBuildError } from "../errors.js";

export type HeaderEntry = [name: string, value: string];

export type HeadersInit =
  | HeaderList
  | Record<string, string | string[] | undefined>
  | Iterable<readonly [string, string]>;

// RFC 7230 3.2.6: token = 1*tchar
const TOKEN_RE = /^[a-zA-Z0-9!#$%&'*+.^_`|~-]+$/;
const INVALID_VALUE_CHAR_RE = /[\r\n\0]/;

/**
 * Ordered header multimap.
 *
 * - Insertion order and repeated names are kept.
 * - Lookups are case-insensitive; names keep the caller's spelling on the wire.
 */
export class HeaderList implements Iterable<HeaderEntry> {
  private list: HeaderEntry[] = [];

  constructor(init?: HeadersInit) {
    if (init) this.extend(init);
  }

  static from(init?: HeadersInit): HeaderList {
    return new HeaderList(init);
  }

  get size(): number {
    return this.list.length;
  }

  append(name: string, value: string): void {
    this.list.push([name, value]);
  }

  /** Replace every value of `name` with a single one. */
  set(name: string, value: string): void {
    this.delete(name);
    this.append(name, value);
  }

  get(name: string): string | undefined {
    const key = name.toLowerCase();
    return this.list.find(([n]) => n.toLowerCase() === key)?.[1];
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.list.filter(([n]) => n.toLowerCase() === key).map(([, v]) => v);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Remove every entry named `name`. Returns how many entries were removed. */
  delete(name: string): number {
    const key = name.toLowerCase();
    const before = this.list.length;
    this.list = this.list.filter(([n]) => n.toLowerCase() !== key);
    return before - this.list.length;
  }

  /** Move all entries into a new list, leaving this one empty. */
  take(): HeaderList {
    const out = new HeaderList();
    out.list = this.list;
    this.list = [];
    return out;
  }

  clone(): HeaderList {
    const out = new HeaderList();
    out.list = this.list.map(([n, v]): HeaderEntry => [n, v]);
    return out;
  }

  entries(): HeaderEntry[] {
    return this.list.map(([n, v]): HeaderEntry => [n, v]);
  }

  [Symbol.iterator](): Iterator<HeaderEntry> {
    return this.entries()[Symbol.iterator]();
  }

  /** `[name1, value1, name2, value2, ...]`, the shape undici accepts for repeated headers. */
  toFlatArray(): string[] {
    const out: string[] = [];
    for (const [n, v] of this.list) out.push(n, v);
    return out;
  }

  /**
   * Throws RequestBuildError when a name is not a token or a value
   * carries CR/LF/NUL.
   */
  validate(): void {
    for (const [name, value] of this.list) {
      if (!TOKEN_RE.test(name)) {
        throw new RequestBuildError(`Invalid header name: ${JSON.stringify(name)}`);
      }
      if (INVALID_VALUE_CHAR_RE.test(value)) {
        throw new RequestBuildError(`Invalid header value for "${name}": contains CR/LF/NUL`);
      }
    }
  }

  private extend(init: HeadersInit): void {
    if (init instanceof HeaderList) {
      for (const [n, v] of init.list) this.append(n, v);
      return;
    }
    if (isIterable(init)) {
      for (const [n, v] of init) this.append(n, v);
      return;
    }
    for (const [n, v] of Object.entries(init)) {
      if (Array.isArray(v)) for (const item of v) this.append(n, item);
      else if (typeof v === "string") this.append(n, v);
    }
  }
}

function isIterable(value: object): value is Iterable<readonly [string, string]> {
  return Symbol.iterator in value;
}
