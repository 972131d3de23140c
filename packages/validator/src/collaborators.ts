import type { Result } from 'neverthrow';

/**
 * Table and column a `unique:table.column` rule points at.
 */
export interface UniquenessTarget {
  table: string;
  column: string;
}

/**
 * Existence check behind the `unique` rule. Connection lifecycle belongs to
 * whoever built the checker.
 */
export interface UniquenessChecker {
  exists(target: UniquenessTarget, value: string): Promise<Result<boolean, Error>>;
}

/**
 * Content-type detection used by the file rules. Returns the extension of
 * the detected type without a leading dot (`png`), or undefined when the
 * content is not recognized.
 */
export interface ContentSniffer {
  detectExtension(bytes: Uint8Array): Promise<string | undefined>;
}

/**
 * Read-only message templates keyed by locale. Compound keys such as
 * `min.string` address a template nested under its category.
 */
export interface LocaleStore {
  lookup(locale: string, key: string): string | undefined;
}
