import { Decimal, RuleParameterError, tryParseDecimal } from '@rulechain/core';

const encoder = new TextEncoder();

/**
 * Length of text rules: UTF-8 bytes, so `max:255` lines up with byte-sized
 * storage columns.
 */
export function byteLength(value: string): number {
  return encoder.encode(value).byteLength;
}

/**
 * Parse one bound of a comparative rule. Length bounds must be integers.
 */
export function parseBound(rule: string, raw: string | undefined, integral: boolean): Decimal {
  const bound = raw === undefined ? undefined : tryParseDecimal(raw);
  if (bound === undefined || bound.isNaN()) {
    throw new RuleParameterError(rule, `invalid bound "${raw ?? ''}"`);
  }
  if (integral && !bound.isInteger()) {
    throw new RuleParameterError(rule, `bound "${raw ?? ''}" must be an integer`);
  }
  return bound;
}

export function parseRange(rule: string, params: readonly string[], integral: boolean): [Decimal, Decimal] {
  if (params.length < 2) {
    throw new RuleParameterError(rule, 'expected two comma-separated bounds');
  }
  return [parseBound(rule, params[0], integral), parseBound(rule, params[1], integral)];
}

// Comparisons are written as negated acceptance so NaN measures always violate.

export function isNotMin(measure: Decimal, bound: Decimal): boolean {
  return !measure.gte(bound);
}

export function isNotMax(measure: Decimal, bound: Decimal): boolean {
  return !measure.lte(bound);
}

/** Also backs `size`, which is an alias of `equal`. */
export function isNotEqual(measure: Decimal, bound: Decimal): boolean {
  return !measure.eq(bound);
}

/** Exclusive bounds: `min < x < max`. */
export function isNotBetween(measure: Decimal, min: Decimal, max: Decimal): boolean {
  return !(measure.gt(min) && measure.lt(max));
}

/** Inclusive bounds: `min <= x <= max`. */
export function isNotFrom(measure: Decimal, min: Decimal, max: Decimal): boolean {
  return !(measure.gte(min) && measure.lte(max));
}
