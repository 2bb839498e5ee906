import { itemIdFor } from '../hashing.js';
import { systemClock, type Clock, type WorkItem, type WorkItemStore } from '../types.js';

export interface MemoryItemStore extends WorkItemStore {
  /** Every registered item in registration order. */
  snapshot(): WorkItem[];
}

export function createMemoryItemStore(clock: Clock = systemClock): MemoryItemStore {
  const items = new Map<string, WorkItem>();

  return {
    async register(input) {
      const itemId = itemIdFor(input.canonicalKey);
      const existing = items.get(itemId);
      if (existing) {
        return { item: existing, created: false };
      }
      const item: WorkItem = {
        item_id: itemId,
        canonical_key: input.canonicalKey,
        source_url: input.sourceUrl,
        external_id: input.externalId ?? null,
        created_at: clock(),
      };
      items.set(itemId, item);
      return { item, created: true };
    },

    async get(itemId) {
      return items.get(itemId) ?? null;
    },

    async list(options = {}) {
      const { limit = 20 } = options;
      return [...items.values()].reverse().slice(0, limit);
    },

    snapshot() {
      return [...items.values()];
    },
  };
}
