import type { BatchSummary } from './dossier.processor.js';

/** Console report: totals, then written, skipped and failed agents in input order. */
export const formatBatchSummary = (summary: BatchSummary): string => {
  const lines = [
    `Dossier generation complete: ${summary.total} records, ${summary.written} written, ` +
      `${summary.rejected} skipped, ${summary.failed} failed, ${summary.warnings} warnings`
  ];

  const written: string[] = [];
  const skipped: string[] = [];
  const failed: string[] = [];

  for (const outcome of summary.outcomes) {
    switch (outcome.status) {
      case 'written':
        written.push(`  ${outcome.agent} -> ${outcome.path}`);
        for (const warning of outcome.warnings) {
          written.push(`    warning: ${warning}`);
        }
        break;
      case 'rejected':
        skipped.push(`  ${outcome.agent} (row ${outcome.rowNumber}): ${outcome.reason}`);
        break;
      case 'failed':
        failed.push(`  ${outcome.agent} (row ${outcome.rowNumber}) at ${outcome.stage}: ${outcome.reason}`);
        break;
    }
  }

  if (written.length > 0) lines.push('Written:', ...written);
  if (skipped.length > 0) lines.push('Skipped:', ...skipped);
  if (failed.length > 0) lines.push('Failed:', ...failed);

  return `${lines.join('\n')}\n`;
};

/** 1 only when there was something to render and nothing was written. */
export const exitCodeFor = (summary: BatchSummary): number =>
  summary.total > 0 && summary.written === 0 ? 1 : 0;
