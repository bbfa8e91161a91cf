/**
 * Path Parameter Types
 *
 * Each parameter type has a pattern a raw segment must satisfy to match and
 * a converter applied before the handler sees the value.
 */

export type ParamType = 'string' | 'int' | 'float' | 'path';

interface Converter {
  pattern: RegExp;
  convert: (raw: string) => string | number;
}

export const CONVERTERS: Readonly<Record<ParamType, Converter>> = {
  string: { pattern: /^[^/]+$/, convert: (raw) => raw },
  int: { pattern: /^\d+$/, convert: toSafeInteger },
  float: { pattern: /^\d+(?:\.\d+)?$/, convert: (raw) => parseFloat(raw) },
  path: { pattern: /^.+$/, convert: (raw) => raw },
};

/**
 * Spellings accepted in `{name:type}`
 */
const TYPE_ALIASES: Readonly<Record<string, ParamType>> = {
  string: 'string',
  str: 'string',
  int: 'int',
  integer: 'int',
  float: 'float',
  path: 'path',
  'rest-of-path': 'path',
};

export function resolveParamType(spelling: string): ParamType | null {
  return Object.hasOwn(TYPE_ALIASES, spelling) ? TYPE_ALIASES[spelling] : null;
}

export function paramTypeNames(): string[] {
  return Object.keys(TYPE_ALIASES);
}

/**
 * Whether a raw segment is acceptable for a parameter type
 */
export function accepts(type: ParamType, raw: string): boolean {
  return CONVERTERS[type].pattern.test(raw);
}

/**
 * Convert a captured value to its declared type.
 *
 * Throws a RangeError when the value passes the pattern but is not
 * representable (an integer beyond 2^53).
 */
export function convertParam(raw: string, type: ParamType): string | number {
  return CONVERTERS[type].convert(raw);
}

function toSafeInteger(raw: string): number {
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Integer parameter out of range: ${raw}`);
  }
  return value;
}
