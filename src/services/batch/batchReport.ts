import { BatchStats, ErrorSummary } from '../../types/batch.js';

const REPORT_ERROR_LIMIT = 10;

/**
 * Percentage of processed files that succeeded; 0 when nothing was processed
 */
export function successRate(stats: BatchStats): number {
  if (stats.processed === 0) {
    return 0;
  }
  return (stats.successful / stats.processed) * 100;
}

export function summarizeErrors(stats: BatchStats, limit: number = REPORT_ERROR_LIMIT): ErrorSummary {
  const bounded = Math.max(0, limit);
  return {
    errors: stats.errors.slice(0, bounded),
    omitted: Math.max(0, stats.errors.length - bounded),
  };
}

export function formatSummaryReport(stats: BatchStats): string {
  const lines = [
    '=== Batch Processing Summary ===',
    `Total Files: ${stats.totalFiles}`,
    `Processed: ${stats.processed}`,
    `Successful: ${stats.successful}`,
    `Failed: ${stats.failed}`,
    `Skipped: ${stats.skipped}`,
    `Success Rate: ${successRate(stats).toFixed(1)}%`,
    `Processing Time: ${stats.processingTimeMs.toFixed(2)}ms`,
    stats.processed > 0
      ? `Avg Time/File: ${(stats.processingTimeMs / stats.processed).toFixed(2)}ms`
      : 'Avg Time/File: N/A',
  ];

  if (stats.errors.length > 0) {
    const summary = summarizeErrors(stats, REPORT_ERROR_LIMIT);
    lines.push('', `=== Errors (${stats.errors.length}) ===`);
    summary.errors.forEach((error, index) => lines.push(`${index + 1}. ${error}`));
    if (summary.omitted > 0) {
      lines.push(`... and ${summary.omitted} more errors`);
    }
  }

  return lines.join('\n');
}
