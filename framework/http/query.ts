/**
 * Immutable query string parameters.
 *
 * Keys may repeat: `get` returns the first value, `getAll` every value.
 * Blank values are kept (`?flag=` yields `''`).
 */

export class QueryParams {
  private readonly data = new Map<string, string[]>();
  readonly raw: string;

  constructor(queryString = '') {
    this.raw = queryString.startsWith('?') ? queryString.slice(1) : queryString;
    for (const [key, value] of new URLSearchParams(this.raw)) {
      const values = this.data.get(key);
      if (values) {
        values.push(value);
      } else {
        this.data.set(key, [value]);
      }
    }
  }

  get(key: string): string | null {
    return this.data.get(key)?.[0] ?? null;
  }

  getAll(key: string): string[] {
    return [...(this.data.get(key) ?? [])];
  }

  has(key: string): boolean {
    return this.data.has(key);
  }

  keys(): string[] {
    return [...this.data.keys()];
  }

  get size(): number {
    return this.data.size;
  }

  /**
   * Value as an integer, or the default when missing or not numeric
   */
  getInt(key: string, defaultValue: number | null = null): number | null {
    const value = this.get(key);
    if (value === null || !/^-?\d+$/.test(value)) return defaultValue;
    return parseInt(value, 10);
  }

  /**
   * Value as a boolean: true/1/yes/on are true, anything else false
   */
  getBool(key: string, defaultValue: boolean | null = null): boolean | null {
    const value = this.get(key);
    if (value === null) return defaultValue;
    return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
  }
}
