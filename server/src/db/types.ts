import type pg from 'pg';

/**
 * Anything that can run a parameterized statement: the pool, a checked-out
 * client inside a transaction, or a test double.
 */
export interface Queryable {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>>;
}

export const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const code = 'code' in error ? error.code : undefined;
  if (code !== UNIQUE_VIOLATION) return false;
  if (!constraint) return true;
  return 'constraint' in error && error.constraint === constraint;
}
