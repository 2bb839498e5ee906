import { z } from 'zod';
import {
  createMemoryStores,
  normalizeUrl,
  type MemoryStores,
  type StageName,
  type WorkItem,
} from '@pressline/press-db';
import {
  createPipeline,
  createStageAdapters,
  parseConfig,
  silentLogger,
  ValidationError,
  type AiTransform,
  type CapturedDocument,
  type Fetcher,
  type FinalRecord,
  type IntakeEntry,
  type IntakeSource,
  type IntakeStatus,
  type Pipeline,
  type PipelineConfig,
  type Publisher,
  type StageAdapter,
} from '@pressline/press-engine';

export const T0 = new Date('2026-03-02T09:00:00.000Z');

export class ManualClock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export function page(title: string, body: string): string {
  return `<html><head><title>${title}</title></head><body><p>${body}</p></body></html>`;
}

export class FakeFetcher implements Fetcher {
  readonly pages = new Map<string, string>();
  readonly calls: string[] = [];

  async capture(canonicalKey: string): Promise<CapturedDocument> {
    this.calls.push(canonicalKey);
    const html = this.pages.get(canonicalKey);
    if (html === undefined) {
      throw new ValidationError(`capture ${canonicalKey}: HTTP 404`);
    }
    return {
      requested_url: canonicalKey,
      final_url: canonicalKey,
      http_status: 200,
      content_type: 'text/html',
      fetched_at: T0.toISOString(),
      html,
    };
  }
}

const MetaPromptInput = z.object({ meta: z.object({ title: z.string().nullable() }) });
const ClaimsPromptInput = z.object({ meta: z.object({ title: z.string() }) });

export type AiResponder = (promptSetId: string, input: unknown) => unknown;

/** Answers the meta prompt with the page title and claims with one claim about it. */
export const defaultAiResponder: AiResponder = (promptSetId, input) => {
  if (promptSetId === 'meta-test') {
    const parsed = MetaPromptInput.parse(input);
    return { title: parsed.meta.title ?? 'Untitled', topics: ['testing'] };
  }
  const parsed = ClaimsPromptInput.parse(input);
  return { claims: [{ text: `About ${parsed.meta.title}` }] };
};

export class FakeAi implements AiTransform {
  readonly calls: Array<{ promptSetId: string; input: unknown }> = [];
  respond: AiResponder = defaultAiResponder;

  async run(promptSetId: string, input: unknown): Promise<unknown> {
    this.calls.push({ promptSetId, input });
    return this.respond(promptSetId, input);
  }
}

export class FakePublisher implements Publisher {
  readonly calls: FinalRecord[] = [];
  /** Thrown, in order, by the next upserts. */
  readonly failures: Error[] = [];
  alwaysFail: Error | null = null;

  async upsert(record: FinalRecord): Promise<{ externalPublishId: string }> {
    this.calls.push(record);
    if (this.alwaysFail) throw this.alwaysFail;
    const failure = this.failures.shift();
    if (failure) throw failure;
    return { externalPublishId: `post-${this.calls.length}` };
  }
}

export class FakeIntake implements IntakeSource {
  entries: IntakeEntry[] = [];
  readonly statuses = new Map<string, { status: IntakeStatus; detail?: string }>();
  /** External ids whose status writes fail. */
  readonly unwritable = new Set<string>();

  async listNewItems(): Promise<IntakeEntry[]> {
    return this.entries.filter(e => !this.statuses.has(e.externalId));
  }

  async markStatus(externalId: string, status: IntakeStatus, detail?: string): Promise<void> {
    if (this.unwritable.has(externalId)) {
      throw new Error(`sheet row ${externalId} is protected`);
    }
    this.statuses.set(externalId, { status, detail });
  }
}

export interface AdapterCall {
  stage: StageName;
  itemId: string;
}

/** Record every invocation, then delegate. */
export function recording(adapter: StageAdapter, calls: AdapterCall[]): StageAdapter {
  return {
    stage: adapter.stage,
    outputSchema: adapter.outputSchema,
    async transform(input) {
      calls.push({ stage: adapter.stage, itemId: input.context.itemId });
      return adapter.transform(input);
    },
  };
}

export const TEST_SERVICES = {
  ai: {
    endpoint: 'http://ai.test/v1/transform',
    model: 'test-model',
    promptSets: { meta: 'meta-test', claims: 'claims-test' },
  },
  publish: { endpoint: 'http://cms.test/v1/records' },
};

export function testConfig(pipeline: Record<string, unknown> = {}): PipelineConfig {
  return parseConfig({
    deployment: 'test',
    pipeline: {
      leaseTtlMs: 60_000,
      backoff: { baseMs: 0, maxMs: 0 },
      ...pipeline,
    },
    services: TEST_SERVICES,
  });
}

export interface Harness {
  clock: ManualClock;
  stores: MemoryStores;
  fetcher: FakeFetcher;
  ai: FakeAi;
  publisher: FakePublisher;
  intake: FakeIntake;
  calls: AdapterCall[];
  config: PipelineConfig;
  pipeline: Pipeline;
  register(url: string, html?: string): Promise<WorkItem>;
  callsFor(itemId: string): StageName[];
}

export function createHarness(
  options: {
    pipeline?: Record<string, unknown>;
    adapters?: Partial<Record<StageName, StageAdapter>>;
    withIntake?: boolean;
  } = {}
): Harness {
  const clock = new ManualClock();
  const stores = createMemoryStores(clock.now);
  const fetcher = new FakeFetcher();
  const ai = new FakeAi();
  const publisher = new FakePublisher();
  const intake = new FakeIntake();
  const calls: AdapterCall[] = [];
  const config = testConfig(options.pipeline);

  const builtIn = createStageAdapters({
    fetcher,
    ai,
    publisher,
    promptSets: TEST_SERVICES.ai.promptSets,
  });
  const pick = (stage: StageName) => recording(options.adapters?.[stage] ?? builtIn[stage], calls);
  const adapters: Record<StageName, StageAdapter> = {
    capture: pick('capture'),
    reduce: pick('reduce'),
    meta: pick('meta'),
    claims: pick('claims'),
    merge: pick('merge'),
    publish: pick('publish'),
  };

  const pipeline = createPipeline(config, stores, {
    adapters,
    intake: options.withIntake ? intake : undefined,
    logger: silentLogger(),
    holder: 'test-holder',
    clock: clock.now,
  });

  return {
    clock,
    stores,
    fetcher,
    ai,
    publisher,
    intake,
    calls,
    config,
    pipeline,
    async register(url, html) {
      const canonicalKey = normalizeUrl(url);
      if (html !== undefined) fetcher.pages.set(canonicalKey, html);
      const { item } = await stores.items.register({ canonicalKey, sourceUrl: url });
      return item;
    },
    callsFor(itemId) {
      return calls.filter(c => c.itemId === itemId).map(c => c.stage);
    },
  };
}
