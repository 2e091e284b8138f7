import { createHash } from 'node:crypto';

type CanonicalScalar = null | boolean | number | string;

type CanonicalValue = CanonicalScalar | CanonicalValue[] | { [key: string]: CanonicalValue };

/**
 * Shortest round-trip decimal, no trailing zeros, `-0` folded into `0`.
 * Unusable measurements (NaN, ±Infinity) are written as null.
 */
const normalizeNumber = (value: number): number | null => {
  if (!Number.isFinite(value)) {
    return null;
  }
  return Object.is(value, -0) ? 0 : value;
};

const formatCanonicalNumber = (value: number): string => {
  const text = value.toString();
  if (!text.includes('e')) {
    return text;
  }
  const [mantissa, exponent] = text.split('e');
  return `${mantissa}e${exponent.startsWith('+') ? exponent.slice(1) : exponent}`;
};

const normalizeValue = (value: unknown, inArray: boolean): CanonicalValue | undefined => {
  if (value === null) {
    return null;
  }
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return inArray ? null : undefined;
  }
  if (typeof value === 'number') {
    return normalizeNumber(value);
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') {
    throw new TypeError('Canonical JSON does not support bigint values');
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown) => normalizeValue(entry, true) ?? null);
  }
  if (value instanceof Float32Array || value instanceof Float64Array) {
    return Array.from(value, (entry) => normalizeNumber(entry));
  }
  if (ArrayBuffer.isView(value)) {
    return Array.from(new Uint8Array(value.buffer, value.byteOffset, value.byteLength));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    const source: Record<string, unknown> = { ...value };
    const result: Record<string, CanonicalValue> = {};
    for (const key of Object.keys(source).sort()) {
      const normalized = normalizeValue(source[key], false);
      if (normalized !== undefined) {
        result[key] = normalized;
      }
    }
    return result;
  }
  return undefined;
};

const stringifyCanonicalValue = (
  value: CanonicalValue,
  indentUnit: string | undefined,
  depth: number,
): string => {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number') {
    return formatCanonicalNumber(value);
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  const entries: [string | null, CanonicalValue][] = Array.isArray(value)
    ? value.map((entry): [null, CanonicalValue] => [null, entry])
    : Object.keys(value).map((key): [string, CanonicalValue] => [key, value[key]]);
  const [open, close] = Array.isArray(value) ? ['[', ']'] : ['{', '}'];
  if (entries.length === 0) {
    return `${open}${close}`;
  }
  const separator = indentUnit === undefined ? ':' : ': ';
  const parts = entries.map(([key, entry]) => {
    const rendered = stringifyCanonicalValue(entry, indentUnit, depth + 1);
    return key === null ? rendered : `${JSON.stringify(key)}${separator}${rendered}`;
  });
  if (indentUnit === undefined) {
    return `${open}${parts.join(',')}${close}`;
  }
  const nextIndent = indentUnit.repeat(depth + 1);
  const baseIndent = indentUnit.repeat(depth);
  return `${open}\n${parts.map((part) => `${nextIndent}${part}`).join(',\n')}\n${baseIndent}${close}`;
};

export type CanonicalJsonWriteOptions = {
  indent?: number;
};

export const writeCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): string => {
  const normalized = normalizeValue(value, false) ?? null;
  const indentUnit =
    typeof options.indent === 'number' && options.indent > 0
      ? ' '.repeat(Math.min(options.indent, 10))
      : undefined;
  return stringifyCanonicalValue(normalized, indentUnit, 0);
};

export const hashCanonicalJsonString = (json: string): string =>
  createHash('sha256').update(json, 'utf8').digest('hex');

export const hashCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): { json: string; hash: string } => {
  const json = writeCanonicalJson(value, options);
  return { json, hash: hashCanonicalJsonString(json) };
};
