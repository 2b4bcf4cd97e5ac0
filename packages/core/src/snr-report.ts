import type { SnrSummary } from './types.js';
import { formatSnr } from './message-template.js';

export interface SnrSummarySource {
  summaries(): SnrSummary[];
}

/**
 * One line per node, sorted by name:
 * `yang: avg 6.2 min -3.0 max 9.5 n=14 recent 5.5,7.0`
 */
export function formatSnrReport(source: SnrSummarySource): string {
  const summaries = source.summaries();
  if (summaries.length === 0) {
    return 'No SNR data recorded';
  }

  return summaries
    .map(
      summary =>
        `${summary.nodeName}: avg ${formatSnr(summary.average)} ` +
        `min ${formatSnr(summary.minSnr)} max ${formatSnr(summary.maxSnr)} ` +
        `n=${summary.count} recent ${summary.recent.map(formatSnr).join(',')}`
    )
    .join('\n');
}
