/**
 * Header map codec
 *
 * Header names keep the case they were set with, while lookups and
 * replacements ignore case. On the wire a header map is a plain object
 * of name → value.
 */

import { z } from 'zod';
import { parseWire, type Codec } from './codec.js';

interface HeaderEntry {
  name: string;
  values: string[];
}

/**
 * Input accepted wherever a header set is expected
 */
export type HeadersInit = HeaderMap | Record<string, string | string[]>;

/**
 * Ordered, case-insensitive header collection.
 *
 * @example
 * ```typescript
 * const headers = new HeaderMap({ 'X-Trace': 'abc' });
 * headers.get('x-trace'); // 'abc'
 * headers.set('X-TRACE', 'def'); // replaces, name becomes 'X-TRACE'
 * ```
 */
export class HeaderMap implements Iterable<[string, string]> {
  private readonly entries = new Map<string, HeaderEntry>();

  constructor(init?: HeadersInit) {
    if (init instanceof HeaderMap) {
      for (const entry of init.entries.values()) {
        this.entries.set(entry.name.toLowerCase(), { name: entry.name, values: [...entry.values] });
      }
    } else if (init) {
      for (const [name, value] of Object.entries(init)) {
        this.set(name, value);
      }
    }
  }

  /**
   * Combined value for a header, or undefined when absent.
   */
  get(name: string): string | undefined {
    return this.entries.get(name.toLowerCase())?.values.join(', ');
  }

  /**
   * All values recorded for a header.
   */
  getAll(name: string): string[] {
    return [...(this.entries.get(name.toLowerCase())?.values ?? [])];
  }

  /**
   * Replace a header. The new spelling of the name is kept.
   */
  set(name: string, value: string | string[]): this {
    this.entries.set(name.toLowerCase(), {
      name,
      values: Array.isArray(value) ? [...value] : [value],
    });
    return this;
  }

  /**
   * Add a value to a header, keeping the existing spelling of the name.
   */
  append(name: string, value: string): this {
    const existing = this.entries.get(name.toLowerCase());
    if (existing) {
      existing.values.push(value);
    } else {
      this.set(name, value);
    }
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(name.toLowerCase());
  }

  delete(name: string): boolean {
    return this.entries.delete(name.toLowerCase());
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Header names in insertion order, as spelled when set.
   */
  names(): string[] {
    return Array.from(this.entries.values(), (entry) => entry.name);
  }

  /**
   * Case-insensitive comparison of names and values.
   */
  equals(other: HeaderMap): boolean {
    if (other.size !== this.size) {
      return false;
    }
    for (const [key, entry] of this.entries) {
      const match = other.entries.get(key);
      if (!match || match.values.join(', ') !== entry.values.join(', ')) {
        return false;
      }
    }
    return true;
  }

  toObject(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const entry of this.entries.values()) {
      result[entry.name] = entry.values.join(', ');
    }
    return result;
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const entry of this.entries.values()) {
      yield [entry.name, entry.values.join(', ')];
    }
  }
}

const wireHeadersSchema = z.record(z.union([z.string(), z.number(), z.boolean()])).nullish();

export const headerMapCodec: Codec<HeaderMap> = {
  type: 'header map',
  encode: (headers) => headers.toObject(),
  decode: (wire) => {
    const headers = new HeaderMap();
    const parsed = parseWire(wireHeadersSchema, 'header map', wire) ?? {};
    for (const [name, value] of Object.entries(parsed)) {
      headers.set(name, String(value));
    }
    return headers;
  },
};
