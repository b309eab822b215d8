import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import { CanonicalValue, NormalizedType } from '../types/index.js';

dayjs.extend(utc);

export const TIMESTAMP_FORMAT = 'YYYY-MM-DDTHH:mm:ss.SSS[Z]';

const DECIMAL_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/**
 * Normalizes a decimal literal without going through floating point:
 * `+001.500` -> `1.5`, `1e3` -> `1000`, `-0.0` -> `0`.
 * Returns null when the input is not a decimal literal.
 */
export function normalizeDecimal(input: string): string | null {
  const match = DECIMAL_PATTERN.exec(input.trim());
  if (!match) return null;

  const [, sign, intRaw = '', fracRaw = '', expRaw] = match;
  if (intRaw === '' && fracRaw === '') return null;

  let digits = intRaw + fracRaw;
  let pointAt = intRaw.length + (expRaw ? Number.parseInt(expRaw, 10) : 0);

  if (pointAt < 0) {
    digits = '0'.repeat(-pointAt) + digits;
    pointAt = 0;
  } else if (pointAt > digits.length) {
    digits = digits + '0'.repeat(pointAt - digits.length);
  }

  const intPart = digits.slice(0, pointAt).replace(/^0+/, '') || '0';
  const fracPart = digits.slice(pointAt).replace(/0+$/, '');
  const body = fracPart ? `${intPart}.${fracPart}` : intPart;

  return body === '0' || sign !== '-' ? body : `-${body}`;
}

/**
 * Canonical numeric value: a JS number when it prints back to the exact
 * normalized digits, otherwise the normalized decimal string.
 */
export function canonicalNumber(value: unknown): CanonicalValue {
  const text = typeof value === 'number' || typeof value === 'bigint' ? value.toString() : String(value);
  const normalized = normalizeDecimal(text);
  if (normalized === null) return text;

  const asNumber = Number(normalized);
  return Number.isFinite(asNumber) && String(asNumber) === normalized ? asNumber : normalized;
}

export function canonicalTimestamp(value: unknown): CanonicalValue {
  if (value instanceof Date || typeof value === 'number') {
    const parsed = dayjs(value);
    return parsed.isValid() ? parsed.utc().format(TIMESTAMP_FORMAT) : String(value);
  }
  const text = String(value);
  const parsed = dayjs.utc(text);
  return parsed.isValid() ? parsed.format(TIMESTAMP_FORMAT) : text;
}

const TRUE_VALUES = new Set(['1', 'Y', 'YES', 'T', 'TRUE']);
const FALSE_VALUES = new Set(['0', 'N', 'NO', 'F', 'FALSE']);

export function canonicalBoolean(value: unknown): CanonicalValue {
  if (typeof value === 'boolean') return value;
  const text = String(value).trim().toUpperCase();
  if (TRUE_VALUES.has(text)) return true;
  if (FALSE_VALUES.has(text)) return false;
  return String(value);
}

export interface CanonicalizeOptions {
  trimFixedWidth: boolean;
}

export function canonicalize(value: unknown, type: NormalizedType, options: CanonicalizeOptions): CanonicalValue {
  if (value === null || value === undefined) return null;

  switch (type.kind) {
    case 'integer':
    case 'decimal':
      return canonicalNumber(value);
    case 'date':
    case 'timestamp':
      return canonicalTimestamp(value);
    case 'boolean':
      return canonicalBoolean(value);
    case 'string': {
      const text = String(value);
      return type.fixed && options.trimFixedWidth ? text.replace(/ +$/, '') : text;
    }
    case 'binary':
      return Buffer.isBuffer(value) ? value.toString('hex') : String(value);
    case 'other':
      return canonicalScalar(value);
  }
}

function canonicalScalar(value: unknown): CanonicalValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return canonicalNumber(value);
  if (value instanceof Date) return canonicalTimestamp(value);
  if (Buffer.isBuffer(value)) return value.toString('hex');
  return JSON.stringify(value);
}

/**
 * Equality token for a canonical value, used to match keys. Strings are kept
 * verbatim so that `'01'` and `'1'` stay distinct text keys.
 */
export function valueToken(value: CanonicalValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return `b:${value}`;
  if (typeof value === 'number') return `n:${normalizeDecimal(value.toString()) ?? value.toString()}`;
  return `s:${value}`;
}

export function valuesEqual(a: CanonicalValue, b: CanonicalValue, emptyStringAsNull = false): boolean {
  if (emptyStringAsNull) {
    a = a === '' ? null : a;
    b = b === '' ? null : b;
  }
  if (a === b) return true;
  if (typeof a === 'number' || typeof b === 'number') {
    const left = typeof a === 'number' || typeof a === 'string' ? normalizeDecimal(String(a)) : null;
    const right = typeof b === 'number' || typeof b === 'string' ? normalizeDecimal(String(b)) : null;
    return left !== null && left === right;
  }
  return false;
}
