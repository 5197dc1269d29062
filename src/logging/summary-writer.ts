import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { WaitStepResult } from '../types/index.js';

export interface SummaryOptions {
  runDir: string;
  results: WaitStepResult[];
  runId?: string;
  url?: string;
  totalWaits?: number;
}

/**
 * Write `summary.md` for a wait-plan run into the run directory.
 */
export async function writeSummary(options: SummaryOptions): Promise<void> {
  const md = buildSummaryMarkdown(options);
  await writeFile(join(options.runDir, 'summary.md'), md, 'utf-8');
}

export function buildSummaryMarkdown(options: Omit<SummaryOptions, 'runDir'>): string {
  const { results, runId, url } = options;
  const totalWaits = options.totalWaits ?? results.length;
  const satisfied = results.filter((r) => r.ok).length;
  const failed = results.filter((r) => !r.ok);
  const skipped = totalWaits - results.length;
  const overallResult = failed.length === 0 && skipped === 0 ? 'Success' : 'Failure';
  const totalDurationMs = results.reduce((sum, r) => sum + (r.durationMs ?? 0), 0);

  const lines: string[] = [
    '# Wait Plan Summary',
    `- Result: ${overallResult}`,
    `- Duration: ${formatDuration(totalDurationMs)}`,
    `- Waits: ${satisfied}/${totalWaits} satisfied`,
  ];
  if (url) lines.push(`- Page: ${url}`);
  if (runId) lines.push(`- Run ID: ${runId}`);

  lines.push('');
  lines.push('## Waits');
  for (const result of results) {
    const status = result.ok ? 'ok' : `FAILED (${result.errorType ?? 'unknown'})`;
    const attempts =
      result.attempts !== undefined ? `, ${result.attempts} attempt${result.attempts === 1 ? '' : 's'}` : '';
    lines.push(`- ${result.waitId}: ${status} in ${result.durationMs ?? 0}ms${attempts}`);
  }
  if (skipped > 0) {
    lines.push(`- ${skipped} wait(s) not run`);
  }

  if (failed.length > 0) {
    lines.push('');
    lines.push('## Failures');
    failed.forEach((result, index) => {
      lines.push(`${index + 1}. "${result.waitId}": ${result.message ?? 'no details'}`);
    });
  }

  return lines.join('\n') + '\n';
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  const millis = Math.floor(ms % 1000);
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}.${String(millis).padStart(3, '0')}s`;
}
