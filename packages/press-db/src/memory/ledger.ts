import { upstreamOf, type StageName } from '../stages.js';
import { isEligible, planReset, planTransition, type TransitionPlan } from '../transitions.js';
import {
  systemClock,
  type Clock,
  type EligibleItem,
  type StageRecord,
  type StateLedger,
  type TransitionResult,
} from '../types.js';
import type { MemoryItemStore } from './items.js';

/**
 * In-process ledger with the same transition rules as the PostgreSQL one.
 * Every write runs synchronously between awaits, which gives it the
 * atomicity the SQL version gets from row locks.
 */
export function createMemoryLedger(items: MemoryItemStore, clock: Clock = systemClock): StateLedger {
  // Every generation of every (item, stage), oldest first
  const generations = new Map<string, StageRecord[]>();
  const keyOf = (itemId: string, stage: StageName) => `${stage}\u0000${itemId}`;

  function current(itemId: string, stage: StageName): StageRecord | null {
    const list = generations.get(keyOf(itemId, stage));
    const last = list?.[list.length - 1];
    return last && last.superseded_at === null ? last : null;
  }

  function upstreamRef(itemId: string, stage: StageName): string | null {
    const upstream = upstreamOf(stage);
    if (upstream === null) {
      return items.snapshot().some(item => item.item_id === itemId) ? itemId : null;
    }
    const record = current(itemId, upstream);
    return record?.status === 'DONE' ? record.artifact_ref : null;
  }

  function apply(
    itemId: string,
    stage: StageName,
    existing: StageRecord | null,
    plan: TransitionPlan,
    now: Date
  ): TransitionResult {
    if (plan.kind === 'conflict') {
      return { ok: false, reason: 'conflict', current: existing === null ? null : { ...existing } };
    }
    const key = keyOf(itemId, stage);
    const list = generations.get(key) ?? [];
    if (plan.kind === 'insert') {
      if (plan.supersede) {
        list[list.length - 1] = { ...plan.supersede, superseded_at: now };
      }
      list.push(plan.record);
    } else {
      list[list.length - 1] = plan.record;
    }
    generations.set(key, list);
    return { ok: true, record: { ...plan.record } };
  }

  return {
    async get(itemId, stage) {
      const record = current(itemId, stage);
      return record === null ? null : { ...record };
    },

    async history(itemId, stage) {
      return (generations.get(keyOf(itemId, stage)) ?? []).map(record => ({ ...record }));
    },

    async transition(input) {
      const now = clock();
      const existing = current(input.itemId, input.stage);
      const ref = input.status === 'DONE' ? upstreamRef(input.itemId, input.stage) : null;
      const plan = planTransition(existing, input, { now, upstreamRef: ref });
      return apply(input.itemId, input.stage, existing, plan, now);
    },

    async reset(itemId, stage, expectedRevision) {
      const now = clock();
      const existing = current(itemId, stage);
      return apply(itemId, stage, existing, planReset(existing, itemId, expectedRevision, now), now);
    },

    async listEligible(stage, upstreamStage, limit, options) {
      const now = clock();
      const candidates: EligibleItem[] = [];

      if (upstreamStage === null) {
        for (const item of items.snapshot()) {
          candidates.push({ itemId: item.item_id, inputHash: item.item_id, readyAt: item.created_at });
        }
      } else {
        for (const item of items.snapshot()) {
          const upstream = current(item.item_id, upstreamStage);
          if (upstream?.status === 'DONE' && upstream.artifact_ref !== null) {
            candidates.push({ itemId: item.item_id, inputHash: upstream.artifact_ref, readyAt: upstream.updated_at });
          }
        }
      }

      return candidates
        .filter(c => isEligible(current(c.itemId, stage), c.inputHash, now, options))
        .sort((a, b) => a.readyAt.getTime() - b.readyAt.getTime() || (a.itemId < b.itemId ? -1 : a.itemId > b.itemId ? 1 : 0))
        .slice(0, limit);
    },

    async list(filter = {}) {
      const records: StageRecord[] = [];
      for (const list of generations.values()) {
        const last = list[list.length - 1];
        if (!last || last.superseded_at !== null) continue;
        if (filter.stage && last.stage !== filter.stage) continue;
        if (filter.status && last.status !== filter.status) continue;
        if (filter.itemId && last.item_id !== filter.itemId) continue;
        records.push({ ...last });
      }
      return records
        .sort((a, b) => b.updated_at.getTime() - a.updated_at.getTime())
        .slice(0, filter.limit ?? 50);
    },
  };
}
