import { Db } from './db.js';
import { ulid } from './ulid.js';
import type { AcquireResult, Lease, LeaseKey, LeaseManager } from './types.js';

export async function acquireLease(
  db: Db,
  key: LeaseKey,
  ttlMs: number,
  holder: string
): Promise<AcquireResult> {
  // Atomic: the upsert only replaces a row whose lease has expired
  const lease = await db.oneOrNone<Lease>(
    `INSERT INTO leases(scope, resource, token, holder, acquired_at, expires_at)
     VALUES($1, $2, $3, $4, now(), now() + ($5::int * interval '1 millisecond'))
     ON CONFLICT (scope, resource) DO UPDATE
       SET token = EXCLUDED.token,
           holder = EXCLUDED.holder,
           acquired_at = EXCLUDED.acquired_at,
           expires_at = EXCLUDED.expires_at
       WHERE leases.expires_at <= now()
     RETURNING *`,
    [key.scope, key.resource, ulid(), holder, ttlMs]
  );
  if (lease) {
    return { acquired: true, lease };
  }

  const current = await db.oneOrNone<Pick<Lease, 'holder' | 'expires_at'>>(
    `SELECT holder, expires_at FROM leases WHERE scope = $1 AND resource = $2`,
    [key.scope, key.resource]
  );
  return { acquired: false, heldBy: current?.holder ?? null, expiresAt: current?.expires_at ?? null };
}

export async function releaseLease(db: Db, lease: Lease): Promise<boolean> {
  const result = await db.result(
    `DELETE FROM leases WHERE scope = $1 AND resource = $2 AND token = $3`,
    [lease.scope, lease.resource, lease.token]
  );
  return result.rowCount > 0;
}

export async function renewLease(db: Db, lease: Lease, ttlMs: number): Promise<Lease | null> {
  return db.oneOrNone<Lease>(
    `UPDATE leases
     SET expires_at = now() + ($4::int * interval '1 millisecond')
     WHERE scope = $1 AND resource = $2 AND token = $3 AND expires_at > now()
     RETURNING *`,
    [lease.scope, lease.resource, lease.token, ttlMs]
  );
}

export async function listLeases(db: Db, scope?: string): Promise<Lease[]> {
  return db.manyOrNone<Lease>(
    `SELECT * FROM leases
     WHERE expires_at > now() AND ($1::text IS NULL OR scope = $1)
     ORDER BY acquired_at`,
    [scope ?? null]
  );
}

export function createPgLeaseManager(db: Db): LeaseManager {
  return {
    acquire: (key, ttlMs, holder) => acquireLease(db, key, ttlMs, holder),
    release: lease => releaseLease(db, lease),
    renew: (lease, ttlMs) => renewLease(db, lease, ttlMs),
    active: scope => listLeases(db, scope),
  };
}
