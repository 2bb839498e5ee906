import { defineStageAdapter, type Publisher, type StageAdapter } from '../adapter.js';
import { MergedRecordSchema, PublishReceiptSchema } from '../documents.js';
import { parsePayload } from './input.js';

export function createPublishAdapter(publisher: Publisher): StageAdapter {
  return defineStageAdapter({
    stage: 'publish',
    outputSchema: PublishReceiptSchema,
    async run({ payload, context }) {
      const merged = parsePayload(MergedRecordSchema, payload, 'merge');
      const { externalPublishId } = await publisher.upsert({ ...merged, item_id: context.itemId }, context.signal);
      return { external_publish_id: externalPublishId };
    },
  });
}
