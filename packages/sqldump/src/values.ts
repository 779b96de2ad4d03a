/**
 * Value constructors and conversions.
 */

import type { FloatValue, IntegerValue, NullValue, TextValue, Value } from './types.js';

/** Smallest 64-bit signed integer */
export const INT64_MIN = -(2n ** 63n);

/** Largest 64-bit signed integer */
export const INT64_MAX = 2n ** 63n - 1n;

const NULL: NullValue = Object.freeze({ kind: 'null' });

export function nullValue(): NullValue {
  return NULL;
}

export function integerValue(value: bigint): IntegerValue {
  return Object.freeze({ kind: 'integer', value });
}

export function floatValue(value: number): FloatValue {
  return Object.freeze({ kind: 'float', value });
}

export function textValue(value: string): TextValue {
  return Object.freeze({ kind: 'text', value });
}

/**
 * Check whether a bigint fits in a 64-bit signed integer.
 */
export function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

/**
 * Render a value for display. NULL renders as the keyword.
 */
export function formatValue(value: Value): string {
  switch (value.kind) {
    case 'null':
      return 'NULL';
    case 'integer':
      return value.value.toString();
    case 'float':
      return String(value.value);
    case 'text':
      return value.value;
  }
}

/**
 * Convert a value to a JSON-safe scalar.
 *
 * Integers outside the safe integer range become decimal strings so no
 * precision is lost.
 */
export function valueToJSON(value: Value): null | number | string {
  switch (value.kind) {
    case 'null':
      return null;
    case 'integer': {
      const asNumber = Number(value.value);
      return Number.isSafeInteger(asNumber) ? asNumber : value.value.toString();
    }
    case 'float':
      return value.value;
    case 'text':
      return value.value;
  }
}
