import type { CategoryCount, DomainResult, MessageCount, MetricsSummary } from '../types';
import { NOT_FOUND_MESSAGE } from '../types';

/**
 * MetricsService
 * Pure aggregation over a completed result sequence
 */
export class MetricsService {
  summarize(results: readonly DomainResult[]): MetricsSummary {
    const total = results.length;
    const count = (predicate: (r: DomainResult) => boolean) => results.filter(predicate).length;
    const category = (n: number): CategoryCount => ({ count: n, percentage: percentage(n, total) });

    const successful = count((r) => r.success);
    const connection = count((r) => !r.success && r.requestType === 'none');
    const notFound = count((r) => !r.success && r.requestType !== 'none' && r.message === NOT_FOUND_MESSAGE);
    const other = total - successful - connection - notFound;

    return {
      total,
      successful: category(successful),
      failed: category(total - successful),
      failures: {
        connection: category(connection),
        notFound: category(notFound),
        other: category(other),
      },
      requestTypes: {
        headed: category(count((r) => r.requestType === 'headed')),
        headless: category(count((r) => r.requestType === 'headless')),
        failed: category(count((r) => r.requestType === 'none')),
      },
      successMessages: frequencyTable(results.filter((r) => r.success), total),
      failureMessages: frequencyTable(results.filter((r) => !r.success), total),
    };
  }
}

export function percentage(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0;
}

/**
 * Message counts sorted by count descending; equal counts keep first-seen order
 */
function frequencyTable(results: readonly DomainResult[], total: number): MessageCount[] {
  const counts = new Map<string, number>();
  for (const { message } of results) {
    counts.set(message, (counts.get(message) || 0) + 1);
  }

  return Array.from(counts, ([message, n]) => ({ message, count: n, percentage: percentage(n, total) })).sort(
    (a, b) => b.count - a.count
  );
}
