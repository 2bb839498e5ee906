import { Db } from './db.js';
import { itemIdFor } from './hashing.js';
import type { RegisterItemInput, RegisterItemResult, WorkItem, WorkItemStore } from './types.js';

export async function registerItem(db: Db, input: RegisterItemInput): Promise<RegisterItemResult> {
  const itemId = itemIdFor(input.canonicalKey);

  const inserted = await db.oneOrNone<WorkItem>(
    `INSERT INTO work_items(item_id, canonical_key, source_url, external_id)
     VALUES($1, $2, $3, $4)
     ON CONFLICT (item_id) DO NOTHING
     RETURNING *`,
    [itemId, input.canonicalKey, input.sourceUrl, input.externalId ?? null]
  );
  if (inserted) {
    return { item: inserted, created: true };
  }

  // Items are immutable: a second registration returns the original row
  const existing = await db.one<WorkItem>(`SELECT * FROM work_items WHERE item_id = $1`, [itemId]);
  return { item: existing, created: false };
}

export async function findItem(db: Db, itemId: string): Promise<WorkItem | null> {
  return db.oneOrNone<WorkItem>(`SELECT * FROM work_items WHERE item_id = $1`, [itemId]);
}

export async function listItems(db: Db, options: { limit?: number } = {}): Promise<WorkItem[]> {
  const { limit = 20 } = options;
  return db.manyOrNone<WorkItem>(
    `SELECT * FROM work_items
     ORDER BY created_at DESC, item_id
     LIMIT $1`,
    [limit]
  );
}

export function createPgItemStore(db: Db): WorkItemStore {
  return {
    register: input => registerItem(db, input),
    get: itemId => findItem(db, itemId),
    list: options => listItems(db, options),
  };
}
