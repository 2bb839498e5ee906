import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SheetIntakeSource, ValidationError, createJsonSheetClient } from '@pressline/press-engine';

describe('Sheet intake', () => {
  let dir: string;
  let path: string;
  let intake: SheetIntakeSource;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pressline-sheet-'));
    path = join(dir, 'intake.sheet.json');
    const rows = [
      ['URL', 'Status', 'Notes', 'Error'],
      ['https://Example.com/a/?utm_source=x', '', 'first', ''],
      ['https://example.com/b', 'QUEUED'],
      ['', ''],
      [' https://example.com/c ', null],
    ];
    await writeFile(path, JSON.stringify({ rows }), 'utf-8');
    intake = new SheetIntakeSource(createJsonSheetClient(path), {
      columns: { url: 0, status: 1, error: 3 },
      firstDataRow: 2,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function rows(): Promise<unknown> {
    const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
    return parsed;
  }

  it('lists rows with a URL and an empty status', async () => {
    expect(await intake.listNewItems()).toEqual([
      { externalId: 'row:2', canonicalKey: 'https://example.com/a', sourceUrl: 'https://Example.com/a/?utm_source=x' },
      { externalId: 'row:5', canonicalKey: 'https://example.com/c', sourceUrl: 'https://example.com/c' },
    ]);
  });

  it('writes status and error cells back to the row', async () => {
    await intake.markStatus('row:2', 'QUEUED');
    await intake.markStatus('row:5', 'FAILED', 'capture: HTTP 404');

    expect(await rows()).toEqual({
      rows: [
        ['URL', 'Status', 'Notes', 'Error'],
        ['https://Example.com/a/?utm_source=x', 'QUEUED', 'first', ''],
        ['https://example.com/b', 'QUEUED'],
        ['', ''],
        [' https://example.com/c ', 'FAILED', '', 'capture: HTTP 404'],
      ],
    });
    expect(await intake.listNewItems()).toEqual([]);
  });

  it('clears the error cell once a row publishes', async () => {
    await intake.markStatus('row:5', 'FAILED', 'claims: ai claims-v1: HTTP 503');
    await intake.markStatus('row:5', 'PUBLISHED', 'ignored');

    expect(await rows()).toHaveProperty(['rows', 4], [' https://example.com/c ', 'PUBLISHED', '', '']);
  });

  it('rejects external ids that are not row references', async () => {
    await expect(intake.markStatus('B7', 'QUEUED')).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects a sheet file of the wrong shape', async () => {
    await writeFile(path, JSON.stringify({ rows: 'nope' }), 'utf-8');

    await expect(intake.listNewItems()).rejects.toThrow(`Invalid sheet file ${path}: rows: Expected array, received string`);
  });
});
