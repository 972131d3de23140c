export { createSqliteDatabase, type CreateSqliteDatabaseOptions } from './database.js';
export { closeSqliteDatabase } from './close.js';
export { KyselyUniquenessChecker, snakeCase } from './uniqueness-checker.js';

// Re-export commonly used Kysely types so consumers don't need kysely as a direct dependency
export { Kysely, sql } from 'kysely';
