import { systemClock, type Clock } from '../types.js';
import { createMemoryArtifactStore } from './artifacts.js';
import { createMemoryItemStore } from './items.js';
import { createMemoryLeaseManager } from './leases.js';
import { createMemoryLedger } from './ledger.js';

export { createMemoryArtifactStore, type MemoryArtifactStore } from './artifacts.js';
export { createMemoryItemStore, type MemoryItemStore } from './items.js';
export { createMemoryLeaseManager } from './leases.js';
export { createMemoryLedger } from './ledger.js';

/** A full set of in-process stores sharing one clock. */
export function createMemoryStores(clock: Clock = systemClock) {
  const items = createMemoryItemStore(clock);
  return {
    items,
    ledger: createMemoryLedger(items, clock),
    leases: createMemoryLeaseManager(clock),
    artifacts: createMemoryArtifactStore(),
  };
}

export type MemoryStores = ReturnType<typeof createMemoryStores>;
