import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@rulechain/core';
import { getLogger } from '@rulechain/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

const logger = getLogger('SqliteDatabase');

export interface CreateSqliteDatabaseOptions {
  /** Open the file read-only; uniqueness lookups never write */
  readonly?: boolean | undefined;
}

/**
 * Create a SQLite-backed Kysely database instance.
 */
export function createSqliteDatabase<T>(
  dbPath: string,
  options?: CreateSqliteDatabaseOptions
): Result<Kysely<T>, Error> {
  try {
    const inMemory = dbPath === ':memory:';
    const dataDir = path.dirname(dbPath);
    if (!inMemory && !options?.readonly && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath, { readonly: !inMemory && options?.readonly === true });

    sqliteDb.pragma('foreign_keys = ON');
    if (!inMemory && !options?.readonly) {
      sqliteDb.pragma('journal_mode = WAL');
    }

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    return ok(
      new Kysely<T>({
        dialect: new SqliteDialect({ database: sqliteDb }),
      })
    );
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}
