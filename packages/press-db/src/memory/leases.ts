import { ulid } from '../ulid.js';
import { systemClock, type Clock, type Lease, type LeaseManager } from '../types.js';

export function createMemoryLeaseManager(clock: Clock = systemClock): LeaseManager {
  const leases = new Map<string, Lease>();
  const keyOf = (scope: string, resource: string) => `${scope}\u0000${resource}`;

  function live(scope: string, resource: string): Lease | null {
    const lease = leases.get(keyOf(scope, resource));
    return lease && lease.expires_at.getTime() > clock().getTime() ? lease : null;
  }

  return {
    async acquire(key, ttlMs, holder) {
      const held = live(key.scope, key.resource);
      if (held) {
        return { acquired: false, heldBy: held.holder, expiresAt: held.expires_at };
      }
      const now = clock();
      const lease: Lease = {
        scope: key.scope,
        resource: key.resource,
        token: ulid(now.getTime()),
        holder,
        acquired_at: now,
        expires_at: new Date(now.getTime() + ttlMs),
      };
      leases.set(keyOf(key.scope, key.resource), lease);
      return { acquired: true, lease: { ...lease } };
    },

    async release(lease) {
      const stored = leases.get(keyOf(lease.scope, lease.resource));
      if (!stored || stored.token !== lease.token) {
        return false;
      }
      leases.delete(keyOf(lease.scope, lease.resource));
      return true;
    },

    async renew(lease, ttlMs) {
      const held = live(lease.scope, lease.resource);
      if (!held || held.token !== lease.token) {
        return null;
      }
      const renewed: Lease = { ...held, expires_at: new Date(clock().getTime() + ttlMs) };
      leases.set(keyOf(lease.scope, lease.resource), renewed);
      return { ...renewed };
    },

    async active(scope) {
      const now = clock().getTime();
      return [...leases.values()]
        .filter(lease => lease.expires_at.getTime() > now && (scope === undefined || lease.scope === scope))
        .sort((a, b) => a.acquired_at.getTime() - b.acquired_at.getTime())
        .map(lease => ({ ...lease }));
    },
  };
}
