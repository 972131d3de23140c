const STRING_PATTERN = /^[0-9a-zA-Z\-+ .]+$/;
// eslint-disable-next-line no-control-regex -- the ASCII range includes control characters
const ASCII_PATTERN = /^[\x00-\x7F]+$/;
const ALPHA_PATTERN = /^[a-zA-Z]+$/;
const NUMERIC_PATTERN = /^[0-9]+$/;
const ALPHA_NUMERIC_PATTERN = /^[a-zA-Z0-9]+$/;

/** Letters, digits, space and `-+.` */
export function isNotString(value: string): boolean {
  return !STRING_PATTERN.test(value);
}

export function isNotAscii(value: string): boolean {
  return !ASCII_PATTERN.test(value);
}

export function isNotAlpha(value: string): boolean {
  return !ALPHA_PATTERN.test(value);
}

/** Digits only; no sign, no decimal point */
export function isNotNumeric(value: string): boolean {
  return !NUMERIC_PATTERN.test(value);
}

export function isNotAlphaNumeric(value: string): boolean {
  return !ALPHA_NUMERIC_PATTERN.test(value);
}
