import { readFile, rename, writeFile } from 'fs/promises';
import { z } from 'zod';
import { normalizeUrl } from '@pressline/press-db';
import type { IntakeEntry, IntakeSource, IntakeStatus } from '../adapter.js';
import { ValidationError, formatIssues } from '../errors.js';

/** Read/write access to a grid of cells; rows and columns are 0-based. */
export interface SheetClient {
  readRows(): Promise<string[][]>;
  writeCells(updates: Array<{ row: number; column: number; value: string }>): Promise<void>;
}

export interface SheetColumns {
  url: number;
  status: number;
  error?: number;
}

export interface SheetIntakeOptions {
  columns: SheetColumns;
  /** 1-based number of the first row holding data (row 1 is usually headers). */
  firstDataRow: number;
}

const SheetFileSchema = z.object({
  rows: z.array(z.array(z.union([z.string(), z.number(), z.null()]).transform(v => (v === null ? '' : String(v))))),
});

/**
 * A sheet stored as `{ "rows": [[...], ...] }` in a JSON file. Writes replace
 * the file through a temporary sibling.
 */
export function createJsonSheetClient(path: string): SheetClient {
  async function readRows(): Promise<string[][]> {
    const parsed = SheetFileSchema.safeParse(JSON.parse(await readFile(path, 'utf-8')));
    if (!parsed.success) {
      throw new ValidationError(`Invalid sheet file ${path}`, formatIssues(parsed.error.issues));
    }
    return parsed.data.rows;
  }

  return {
    readRows,
    async writeCells(updates) {
      const rows = await readRows();
      for (const { row, column, value } of updates) {
        while (rows.length <= row) rows.push([]);
        const cells = rows[row] ?? [];
        while (cells.length <= column) cells.push('');
        cells[column] = value;
        rows[row] = cells;
      }
      const tmp = `${path}.tmp`;
      await writeFile(tmp, JSON.stringify({ rows }, null, 2) + '\n', 'utf-8');
      await rename(tmp, path);
    },
  };
}

function rowRef(row: number): string {
  return `row:${row + 1}`;
}

function parseRowRef(externalId: string): number {
  const match = /^row:(\d+)$/.exec(externalId);
  if (!match?.[1]) {
    throw new ValidationError(`Not a sheet row reference: ${externalId}`);
  }
  return parseInt(match[1], 10) - 1;
}

/**
 * Intake over a sheet: rows with a URL and an empty status cell are new.
 * External ids are `row:<1-based row number>`.
 */
export class SheetIntakeSource implements IntakeSource {
  constructor(private readonly sheet: SheetClient, private readonly options: SheetIntakeOptions) {}

  async listNewItems(): Promise<IntakeEntry[]> {
    const rows = await this.sheet.readRows();
    const { columns, firstDataRow } = this.options;
    const entries: IntakeEntry[] = [];

    for (let row = firstDataRow - 1; row < rows.length; row++) {
      const cells = rows[row] ?? [];
      const url = (cells[columns.url] ?? '').trim();
      const status = (cells[columns.status] ?? '').trim();
      if (url === '' || status !== '') continue;
      entries.push({ externalId: rowRef(row), canonicalKey: normalizeUrl(url), sourceUrl: url });
    }
    return entries;
  }

  async markStatus(externalId: string, status: IntakeStatus, detail?: string): Promise<void> {
    const row = parseRowRef(externalId);
    const { columns } = this.options;
    const updates: Array<{ row: number; column: number; value: string }> = [{ row, column: columns.status, value: status }];
    if (columns.error !== undefined) {
      updates.push({ row, column: columns.error, value: status === 'FAILED' ? detail ?? '' : '' });
    }
    await this.sheet.writeCells(updates);
  }
}
