import pgPromise from 'pg-promise';
import type { IBaseProtocol } from 'pg-promise';

const pgp = pgPromise();

export function createDb(databaseUrl?: string) {
  const url = databaseUrl ?? process.env.DATABASE_URL;
  if (!url) {
    throw new Error('DATABASE_URL not set');
  }
  return pgp(url);
}

export type Db = ReturnType<typeof createDb>;

// Either the pool or an open transaction
// eslint-disable-next-line @typescript-eslint/ban-types
export type Queryable = IBaseProtocol<{}>;

export function isUniqueViolation(e: unknown): boolean {
  // PostgreSQL error code 23505
  return typeof e === 'object' && e !== null && 'code' in e && e.code === '23505';
}
