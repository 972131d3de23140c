import { readFileSync } from 'node:fs';

import { z } from 'zod';

import type { LocaleStore } from '../collaborators.js';

export const DEFAULT_LOCALE = 'en';
export const BUNDLED_LOCALES = ['en', 'fr'] as const;

export const localeTableSchema = z.record(z.string(), z.union([z.string(), z.record(z.string(), z.string())]));

export type LocaleTable = Readonly<Record<string, string | Readonly<Record<string, string>>>>;

function freezeTable(table: z.infer<typeof localeTableSchema>): LocaleTable {
  for (const entry of Object.values(table)) {
    if (typeof entry !== 'string') Object.freeze(entry);
  }
  return Object.freeze(table);
}

/**
 * Locale tables held in memory. Unknown locales fall back to the default
 * locale's table.
 */
export class TableLocaleStore implements LocaleStore {
  private readonly tables: ReadonlyMap<string, LocaleTable>;

  constructor(
    tables: Readonly<Record<string, LocaleTable>>,
    private readonly fallbackLocale = DEFAULT_LOCALE
  ) {
    this.tables = new Map(Object.entries(tables).map(([locale, table]) => [locale.toLowerCase(), table]));
  }

  lookup(locale: string, key: string): string | undefined {
    const table = this.tables.get(locale.toLowerCase()) ?? this.tables.get(this.fallbackLocale);
    if (!table) return undefined;

    const dot = key.indexOf('.');
    if (dot === -1) {
      const entry = table[key];
      return typeof entry === 'string' ? entry : undefined;
    }

    const category = table[key.slice(0, dot)];
    if (category === undefined || typeof category === 'string') return undefined;
    return category[key.slice(dot + 1)];
  }
}

let bundled: TableLocaleStore | undefined;

/**
 * Store over the locale files shipped with the package. Loaded on first
 * use, validated, and frozen.
 */
export function bundledLocaleStore(): TableLocaleStore {
  if (!bundled) {
    const tables: Record<string, LocaleTable> = {};
    for (const locale of BUNDLED_LOCALES) {
      const raw: unknown = JSON.parse(readFileSync(new URL(`../locales/${locale}.json`, import.meta.url), 'utf8'));
      tables[locale] = freezeTable(localeTableSchema.parse(raw));
    }
    bundled = new TableLocaleStore(tables);
  }
  return bundled;
}
