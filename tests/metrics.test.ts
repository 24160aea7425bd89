import { describe, expect, it } from 'vitest';
import { MetricsService, percentage } from '../src/services/metrics.service';
import type { DomainResult } from '../src/types';

const ok = (url: string, source: string): DomainResult => ({
  url,
  logoLink: `${url}/logo.png`,
  success: true,
  requestType: 'headed',
  message: source,
});

const RESULTS: DomainResult[] = [
  ok('https://www.a.com', 'og_image'),
  { url: 'b.com', success: false, requestType: 'none', message: 'Error ENOTFOUND' },
  { url: 'https://www.c.com', success: false, requestType: 'headed', message: 'not_found' },
  { ...ok('https://www.d.com', 'favicon'), requestType: 'headless' },
  { url: 'e.com', success: false, requestType: 'none', message: '403' },
  { url: 'f.com', success: false, requestType: 'none', message: 'Error ENOTFOUND' },
  ok('https://www.g.com', 'og_image'),
  { url: 'https://www.h.com', success: false, requestType: 'headless', message: 'Error SyntaxError' },
];

describe('MetricsService', () => {
  const summary = new MetricsService().summarize(RESULTS);

  it('counts totals and success rate', () => {
    expect(summary.total).toBe(8);
    expect(summary.successful).toEqual({ count: 3, percentage: 37.5 });
    expect(summary.failed).toEqual({ count: 5, percentage: 62.5 });
  });

  it('splits failures into connection, not found and other', () => {
    expect(summary.failures.connection).toEqual({ count: 3, percentage: 37.5 });
    expect(summary.failures.notFound).toEqual({ count: 1, percentage: 12.5 });
    expect(summary.failures.other).toEqual({ count: 1, percentage: 12.5 });
  });

  it('counts request types', () => {
    expect(summary.requestTypes.headed.count).toBe(3);
    expect(summary.requestTypes.headless.count).toBe(2);
    expect(summary.requestTypes.failed.count).toBe(3);
  });

  it('sorts message tables by count and keeps first-seen order on ties', () => {
    expect(summary.successMessages.map((m) => [m.message, m.count])).toEqual([
      ['og_image', 2],
      ['favicon', 1],
    ]);
    expect(summary.failureMessages.map((m) => [m.message, m.count])).toEqual([
      ['Error ENOTFOUND', 2],
      ['not_found', 1],
      ['403', 1],
      ['Error SyntaxError', 1],
    ]);
    expect(summary.failureMessages[0].percentage).toBe(25);
  });

  it('keeps the failure categories consistent with the overall failure count', () => {
    const { connection, notFound, other } = summary.failures;

    expect(connection.count + notFound.count + other.count).toBe(summary.total - summary.successful.count);
    expect(connection.percentage + notFound.percentage + other.percentage).toBeCloseTo(summary.failed.percentage);
  });

  it('emits zero percentages for an empty run', () => {
    const empty = new MetricsService().summarize([]);

    expect(empty.total).toBe(0);
    expect(empty.successful).toEqual({ count: 0, percentage: 0 });
    expect(empty.failed).toEqual({ count: 0, percentage: 0 });
    expect(empty.failures.other).toEqual({ count: 0, percentage: 0 });
    expect(empty.failureMessages).toEqual([]);
  });
});

describe('percentage', () => {
  it('guards against a zero total', () => {
    expect(percentage(3, 0)).toBe(0);
    expect(percentage(1, 4)).toBe(25);
  });
});
