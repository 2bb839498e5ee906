import { describe, it, expect, beforeEach } from 'vitest';
import { createMemoryLeaseManager, itemLeaseKey, sweepLeaseKey, type LeaseManager } from '@pressline/press-db';
import { ManualClock, T0 } from './helpers.js';

describe('Lease manager (in-memory)', () => {
  let clock: ManualClock;
  let leases: LeaseManager;
  const key = itemLeaseKey('sha256:item', 'meta');

  beforeEach(() => {
    clock = new ManualClock();
    leases = createMemoryLeaseManager(clock.now);
  });

  it('grants a key to one holder at a time', async () => {
    const first = await leases.acquire(key, 1_000, 'worker-a');
    const second = await leases.acquire(key, 1_000, 'worker-b');

    expect(first.acquired).toBe(true);
    expect(second).toEqual({ acquired: false, heldBy: 'worker-a', expiresAt: new Date(T0.getTime() + 1_000) });
  });

  it('keys leases by scope and resource', async () => {
    await leases.acquire(key, 1_000, 'worker-a');

    expect((await leases.acquire(itemLeaseKey('sha256:item', 'claims'), 1_000, 'worker-b')).acquired).toBe(true);
    expect((await leases.acquire(sweepLeaseKey('default'), 1_000, 'worker-b')).acquired).toBe(true);
  });

  it('lets a new holder take an expired lease', async () => {
    await leases.acquire(key, 1_000, 'worker-a');
    clock.advance(1_000);

    const taken = await leases.acquire(key, 1_000, 'worker-b');

    expect(taken.acquired).toBe(true);
    if (taken.acquired) expect(taken.lease.holder).toBe('worker-b');
  });

  it('matches release and renew on the token', async () => {
    const a = await leases.acquire(key, 1_000, 'worker-a');
    if (!a.acquired) throw new Error('expected lease');
    clock.advance(1_000);
    const b = await leases.acquire(key, 1_000, 'worker-b');
    if (!b.acquired) throw new Error('expected lease');

    expect(await leases.release(a.lease)).toBe(false);
    expect(await leases.renew(a.lease, 1_000)).toBeNull();
    expect((await leases.active()).map(l => l.holder)).toEqual(['worker-b']);

    expect(await leases.release(b.lease)).toBe(true);
    expect(await leases.active()).toEqual([]);
  });

  it('extends a live lease and refuses to revive an expired one', async () => {
    const a = await leases.acquire(key, 1_000, 'worker-a');
    if (!a.acquired) throw new Error('expected lease');

    clock.advance(500);
    const renewed = await leases.renew(a.lease, 1_000);
    expect(renewed?.expires_at).toEqual(new Date(T0.getTime() + 1_500));

    clock.advance(1_500);
    expect(await leases.renew(a.lease, 1_000)).toBeNull();
  });

  it('lists only unexpired leases, optionally by scope', async () => {
    await leases.acquire(key, 1_000, 'worker-a');
    await leases.acquire(sweepLeaseKey('default'), 5_000, 'worker-b');

    expect((await leases.active('sweep')).map(l => l.resource)).toEqual(['default']);
    clock.advance(2_000);
    expect((await leases.active()).map(l => l.scope)).toEqual(['sweep']);
  });
});
