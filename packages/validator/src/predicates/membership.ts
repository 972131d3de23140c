/**
 * Exact, case-sensitive membership in the rule's token list.
 */
export function isNotEnum(value: string, tokens: readonly string[]): boolean {
  return !tokens.includes(value);
}

/**
 * Cross-field equality on trimmed string forms. Backs both `same` and `match`.
 */
export function isNotSame(value: string, other: string): boolean {
  return value.trim() !== other.trim();
}
