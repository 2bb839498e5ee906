import { STAGE_STATUSES, isStageName, type StageName, type StageStatus } from '@pressline/press-db';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface FlagSpec {
  values: readonly string[];
  booleans: readonly string[];
}

type ParsedFlags = Map<string, string | true>;

function parseFlags(argv: string[], spec: FlagSpec): ParsedFlags {
  const flags: ParsedFlags = new Map();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      flags.set('help', true);
    } else if (arg.startsWith('--')) {
      const name = arg.slice(2);
      if (spec.booleans.includes(name)) {
        flags.set(name, true);
      } else if (spec.values.includes(name)) {
        const value = argv[++i];
        if (value === undefined || value.startsWith('--')) {
          throw new UsageError(`--${name} requires a value`);
        }
        flags.set(name, value);
      } else {
        throw new UsageError(`Unknown flag: ${arg}`);
      }
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }
  return flags;
}

function stringFlag(flags: ParsedFlags, name: string): string | undefined {
  const value = flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

function stageFlag(flags: ParsedFlags): StageName | undefined {
  const value = stringFlag(flags, 'stage');
  if (value === undefined) return undefined;
  if (!isStageName(value)) {
    throw new UsageError(`Unknown stage: ${value}`);
  }
  return value;
}

function positiveIntFlag(flags: ParsedFlags, name: string): number | undefined {
  const value = stringFlag(flags, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`Invalid --${name} value: ${value}`);
  }
  return n;
}

function statusFlag(flags: ParsedFlags): StageStatus | undefined {
  const value = stringFlag(flags, 'status');
  if (value === undefined) return undefined;
  const status = STAGE_STATUSES.find(s => s === value.toUpperCase());
  if (!status) {
    throw new UsageError(`Unknown status: ${value}`);
  }
  return status;
}

export const DEFAULT_CONFIG_PATH = 'pressline.config.yaml';

export type Parsed<T> = { help: true } | ({ help: false } & T);

export interface RunStageArgs {
  stage: StageName;
  limit?: number;
  configPath: string;
}

export function parseRunStageArgs(argv: string[]): Parsed<RunStageArgs> {
  const flags = parseFlags(argv, { values: ['stage', 'limit', 'config'], booleans: [] });
  if (flags.has('help')) return { help: true };

  const stage = stageFlag(flags);
  if (!stage) {
    throw new UsageError('--stage is required');
  }
  return {
    help: false,
    stage,
    limit: positiveIntFlag(flags, 'limit'),
    configPath: stringFlag(flags, 'config') ?? DEFAULT_CONFIG_PATH,
  };
}

export interface RunSweepArgs {
  configPath: string;
  intake: boolean;
  limit?: number;
}

export function parseRunSweepArgs(argv: string[]): Parsed<RunSweepArgs> {
  const flags = parseFlags(argv, { values: ['config', 'limit'], booleans: ['no-intake'] });
  if (flags.has('help')) return { help: true };
  return {
    help: false,
    configPath: stringFlag(flags, 'config') ?? DEFAULT_CONFIG_PATH,
    intake: !flags.has('no-intake'),
    limit: positiveIntFlag(flags, 'limit'),
  };
}

export interface ListArgs {
  stage?: StageName;
  status?: StageStatus;
  itemId?: string;
  limit: number;
}

export function parseListArgs(argv: string[]): Parsed<ListArgs> {
  const flags = parseFlags(argv, { values: ['stage', 'status', 'item', 'limit'], booleans: [] });
  if (flags.has('help')) return { help: true };
  return {
    help: false,
    stage: stageFlag(flags),
    status: statusFlag(flags),
    itemId: stringFlag(flags, 'item'),
    limit: positiveIntFlag(flags, 'limit') ?? 20,
  };
}

export interface ResetArgs {
  itemId: string;
  stage: StageName;
}

export function parseResetArgs(argv: string[]): Parsed<ResetArgs> {
  const flags = parseFlags(argv, { values: ['item', 'stage'], booleans: [] });
  if (flags.has('help')) return { help: true };

  const itemId = stringFlag(flags, 'item');
  const stage = stageFlag(flags);
  if (!itemId || !stage) {
    throw new UsageError('--item and --stage are required');
  }
  return { help: false, itemId, stage };
}
