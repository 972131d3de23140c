import { Decimal } from 'decimal.js';

// Bounds in rule parameters and integer field values can exceed 2^53,
// so comparisons run on decimals rather than numbers.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Try to parse a string, number or bigint to a Decimal.
 * Returns undefined for empty input or anything decimal.js rejects.
 */
export function tryParseDecimal(value: string | number | bigint | Decimal | undefined | null): Decimal | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  try {
    return new Decimal(typeof value === 'bigint' ? value.toString() : value);
  } catch {
    return undefined;
  }
}

export { Decimal };
