import type { StageRecord } from '@pressline/press-db';
import type { IntakeSyncResult, StageRunSummary, SweepResult } from '@pressline/press-engine';

export function formatDate(date: Date | null): string {
  return date ? date.toISOString().replace('T', ' ').slice(0, 19) : 'N/A';
}

export function shortId(id: string): string {
  const hex = id.startsWith('sha256:') ? id.slice('sha256:'.length) : id;
  return hex.length > 12 ? hex.slice(0, 12) : hex;
}

export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 3) + '...';
}

export function formatStageTable(summaries: StageRunSummary[]): string {
  const lines: string[] = [];
  lines.push('='.repeat(96));
  lines.push(
    `${'Stage'.padEnd(10)} ${'Selected'.padEnd(9)} ${'Done'.padEnd(6)} ${'Skipped'.padEnd(8)} ` +
    `${'Busy'.padEnd(6)} ${'Conflict'.padEnd(9)} ${'Retry'.padEnd(6)} ${'Terminal'.padEnd(9)} ${'Lost'.padEnd(5)} Aborted`
  );
  lines.push('-'.repeat(96));
  for (const s of summaries) {
    const c = s.counts;
    lines.push(
      `${s.stage.padEnd(10)} ${String(s.selected).padEnd(9)} ${String(c.done).padEnd(6)} ` +
      `${String(c.skipped).padEnd(8)} ${String(c.busy).padEnd(6)} ${String(c.conflict).padEnd(9)} ` +
      `${String(c.failed_retryable).padEnd(6)} ${String(c.failed_terminal).padEnd(9)} ${String(c.lost_lease).padEnd(5)} ${c.aborted}`
    );
  }
  lines.push('='.repeat(96));
  return lines.join('\n');
}

export function formatIntake(intake: IntakeSyncResult | null): string {
  if (!intake) return 'Intake: skipped';
  return `Intake: ${intake.seen} seen | ${intake.registered} registered | ${intake.existing} existing | ${intake.rejected} rejected`;
}

export function formatSweep(result: SweepResult): string {
  const status = result.aborted ? `aborted (${result.abortReason ?? 'signal'})` : 'finished';
  return [
    `Sweep ${result.runId} ${status} in ${result.elapsedMs}ms`,
    formatIntake(result.intake),
    formatStageTable(result.stages),
  ].join('\n');
}

export function formatRecordTable(records: StageRecord[]): string {
  const lines: string[] = [];
  lines.push(
    `${'ITEM_ID'.padEnd(14)} ${'STAGE'.padEnd(8)} ${'STATUS'.padEnd(8)} ${'GEN'.padEnd(4)} ` +
    `${'TRIES'.padEnd(6)} ${'UPDATED_AT'.padEnd(20)} DETAIL`
  );
  lines.push('-'.repeat(100));
  for (const r of records) {
    const detail = r.status === 'FAILED'
      ? truncate(`${r.error_kind ?? 'error'}${r.retryable ? ' (retryable)' : ''}: ${r.error_message ?? ''}`, 40)
      : r.artifact_ref ? shortId(r.artifact_ref) : '';
    lines.push(
      `${shortId(r.item_id).padEnd(14)} ${r.stage.padEnd(8)} ${r.status.padEnd(8)} ${String(r.generation).padEnd(4)} ` +
      `${String(r.attempts).padEnd(6)} ${formatDate(r.updated_at).padEnd(20)} ${detail}`
    );
  }
  return lines.join('\n');
}
