import { wrapError } from '@rulechain/core';
import { getLogger } from '@rulechain/logger';
import type { UniquenessChecker, UniquenessTarget } from '@rulechain/validator';
import { sql, type Kysely } from 'kysely';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('KyselyUniquenessChecker');

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * `userName` -> `user_name`. Already snake-cased names pass through.
 */
export function snakeCase(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toLowerCase();
}

/**
 * Backs the `unique:table.column` rule with a `select 1 ... limit 1` lookup.
 * Column names written in camelCase are matched against snake_case columns.
 */
export class KyselyUniquenessChecker<T> implements UniquenessChecker {
  constructor(private readonly db: Kysely<T>) {}

  async exists(target: UniquenessTarget, value: string): Promise<Result<boolean, Error>> {
    const column = snakeCase(target.column);
    if (!IDENTIFIER_PATTERN.test(target.table) || !IDENTIFIER_PATTERN.test(column)) {
      return err(new Error(`Invalid uniqueness target: ${target.table}.${target.column}`));
    }

    try {
      const result = await sql<{ found: number }>`select 1 as found from ${sql.table(target.table)} where ${sql.ref(
        column
      )} = ${value} limit 1`.execute(this.db);
      logger.trace({ column, found: result.rows.length > 0, table: target.table }, 'Uniqueness lookup');
      return ok(result.rows.length > 0);
    } catch (error) {
      logger.error({ column, error, table: target.table }, 'Uniqueness lookup failed');
      return wrapError(error, `Uniqueness lookup on ${target.table}.${column} failed`);
    }
  }
}
