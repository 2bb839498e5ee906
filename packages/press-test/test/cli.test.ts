import { describe, it, expect } from 'vitest';
import {
  EXIT_BUSY,
  EXIT_FAILURE,
  EXIT_USAGE,
  UsageError,
  exitCodeFor,
  formatIntake,
  formatRecordTable,
  parseListArgs,
  parseResetArgs,
  parseRunStageArgs,
  parseRunSweepArgs,
  shortId,
  truncate,
} from '@pressline/press-cli';
import { ConfigError, InfrastructureError, SweepBusyError, TransientError } from '@pressline/press-engine';
import type { StageRecord } from '@pressline/press-db';
import { T0 } from './helpers.js';

describe('CLI arguments', () => {
  it('parses run-stage flags', () => {
    expect(parseRunStageArgs(['--stage', 'meta', '--limit', '10', '--config', 'prod.yaml'])).toEqual({
      help: false,
      stage: 'meta',
      limit: 10,
      configPath: 'prod.yaml',
    });
    expect(parseRunStageArgs(['--stage', 'capture'])).toEqual({
      help: false,
      stage: 'capture',
      limit: undefined,
      configPath: 'pressline.config.yaml',
    });
    expect(parseRunStageArgs(['-h'])).toEqual({ help: true });
  });

  it('rejects bad run-stage input', () => {
    expect(() => parseRunStageArgs([])).toThrow(new UsageError('--stage is required'));
    expect(() => parseRunStageArgs(['--stage', 'summarize'])).toThrow('Unknown stage: summarize');
    expect(() => parseRunStageArgs(['--stage', 'meta', '--limit', '0'])).toThrow('Invalid --limit value: 0');
    expect(() => parseRunStageArgs(['--stage', 'meta', '--limit', '2.5'])).toThrow('Invalid --limit value: 2.5');
    expect(() => parseRunStageArgs(['--stage'])).toThrow('--stage requires a value');
    expect(() => parseRunStageArgs(['--stage', '--limit'])).toThrow('--stage requires a value');
    expect(() => parseRunStageArgs(['--verbose'])).toThrow('Unknown flag: --verbose');
    expect(() => parseRunStageArgs(['meta'])).toThrow('Unexpected argument: meta');
  });

  it('parses run-sweep flags', () => {
    expect(parseRunSweepArgs([])).toEqual({ help: false, configPath: 'pressline.config.yaml', intake: true, limit: undefined });
    expect(parseRunSweepArgs(['--no-intake', '--limit', '5'])).toEqual({
      help: false,
      configPath: 'pressline.config.yaml',
      intake: false,
      limit: 5,
    });
  });

  it('parses list filters with a case-insensitive status', () => {
    expect(parseListArgs(['--stage', 'publish', '--status', 'failed'])).toEqual({
      help: false,
      stage: 'publish',
      status: 'FAILED',
      itemId: undefined,
      limit: 20,
    });
    expect(() => parseListArgs(['--status', 'stuck'])).toThrow('Unknown status: stuck');
  });

  it('requires both item and stage for reset', () => {
    expect(parseResetArgs(['--item', 'sha256:abc', '--stage', 'claims'])).toEqual({
      help: false,
      itemId: 'sha256:abc',
      stage: 'claims',
    });
    expect(() => parseResetArgs(['--item', 'sha256:abc'])).toThrow('--item and --stage are required');
  });
});

describe('exit codes', () => {
  it('maps errors to process exit codes', () => {
    expect(exitCodeFor(new UsageError('x'))).toBe(EXIT_USAGE);
    expect(exitCodeFor(new ConfigError('x'))).toBe(EXIT_USAGE);
    expect(exitCodeFor(new SweepBusyError('host-1', null))).toBe(EXIT_BUSY);
    expect(exitCodeFor(new InfrastructureError('ledger down'))).toBe(EXIT_FAILURE);
    expect(exitCodeFor(new TransientError('x'))).toBe(EXIT_FAILURE);
    expect([EXIT_USAGE, EXIT_BUSY, EXIT_FAILURE]).toEqual([2, 75, 1]);
  });
});

describe('formatting', () => {
  it('shortens ids and strings', () => {
    expect(shortId('sha256:0123456789abcdef')).toBe('0123456789ab');
    expect(shortId('row:2')).toBe('row:2');
    expect(truncate('abcdefghij', 6)).toBe('abc...');
    expect(truncate('abc', 6)).toBe('abc');
  });

  it('summarizes intake', () => {
    expect(formatIntake(null)).toBe('Intake: skipped');
    expect(formatIntake({ seen: 3, registered: 1, existing: 1, rejected: 1 })).toBe(
      'Intake: 3 seen | 1 registered | 1 existing | 1 rejected'
    );
  });

  it('shows the error for failed records and the artifact for done ones', () => {
    const base: StageRecord = {
      item_id: 'sha256:aaaaaaaaaaaaaaaa',
      stage: 'meta',
      generation: 1,
      revision: 2,
      status: 'DONE',
      input_hash: 'sha256:in',
      artifact_ref: 'sha256:bbbbbbbbbbbbbbbb',
      error_kind: null,
      error_message: null,
      retryable: false,
      attempts: 1,
      next_attempt_at: null,
      created_at: T0,
      updated_at: T0,
      superseded_at: null,
    };
    const failed: StageRecord = {
      ...base,
      stage: 'publish',
      status: 'FAILED',
      artifact_ref: null,
      error_kind: 'transient',
      error_message: 'cms 503',
      retryable: true,
      attempts: 2,
    };

    const lines = formatRecordTable([base, failed]).split('\n');

    expect(lines[2]).toBe('aaaaaaaaaaaa   meta     DONE     1    1      2026-03-02 09:00:00  bbbbbbbbbbbb');
    expect(lines[3]).toBe('aaaaaaaaaaaa   publish  FAILED   1    2      2026-03-02 09:00:00  transient (retryable): cms 503');
  });
});
