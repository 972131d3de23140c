import type { IntegerValue } from '../shape/field-value.js';

const INT_PATTERN = /^(?:-?(?:0|[1-9][0-9]*))$/;
// At least two digits: single-digit values do not classify as unsigned.
const UINT_PATTERN = /^[1-9]\d+$/;

/**
 * Checked on the value's decimal string, so fractional or exponent-notation
 * numbers in an integer field are rejected.
 */
export function isNotInt(value: IntegerValue): boolean {
  return !INT_PATTERN.test(value.toString());
}

export function isNotUint(value: IntegerValue): boolean {
  return !UINT_PATTERN.test(value.toString());
}

export function isNotFloat(value: number): boolean {
  return !Number.isFinite(value);
}
