/**
 * Immutable, case-insensitive HTTP headers.
 *
 * `get` returns the first value for a name; `getAll` returns every value
 * (repeated Set-Cookie, Accept, etc.). Names are compared case-insensitively
 * and reported lower-cased.
 */

import type { RawHeaders } from './transport.ts';

export class HeaderMap implements Iterable<[string, string]> {
  private readonly raw: ReadonlyArray<readonly [string, string]>;

  constructor(raw: RawHeaders = []) {
    this.raw = raw.map(([name, value]) => [name.toLowerCase(), value] as const);
  }

  /**
   * First value for a header, or null when absent
   */
  get(name: string): string | null {
    const key = name.toLowerCase();
    for (const [n, v] of this.raw) {
      if (n === key) return v;
    }
    return null;
  }

  /**
   * All values for a header, in arrival order
   */
  getAll(name: string): string[] {
    const key = name.toLowerCase();
    return this.raw.filter(([n]) => n === key).map(([, v]) => v);
  }

  has(name: string): boolean {
    return this.get(name) !== null;
  }

  /**
   * Distinct header names
   */
  keys(): string[] {
    return [...new Set(this.raw.map(([n]) => n))];
  }

  get size(): number {
    return this.keys().length;
  }

  /**
   * Raw name/value pairs (names lower-cased)
   */
  entries(): Array<[string, string]> {
    return this.raw.map(([n, v]) => [n, v]);
  }

  [Symbol.iterator](): Iterator<[string, string]> {
    return this.entries()[Symbol.iterator]();
  }
}
