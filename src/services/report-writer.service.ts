import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import Papa from 'papaparse';
import type { CategoryCount, DomainResult, MessageCount, MetricsSummary } from '../types';
import type { Logger } from '../utils/logger';

export const RESULTS_HEADER = 'url,success,logo_link,request_type,message';

// logo_link and message are always quoted
const QUOTED_COLUMNS = [false, false, true, false, true];

export interface ReportWriterOptions {
  outputDir: string;
  resultsFile: string;
  metricsFile: string;
}

/**
 * ReportWriterService
 * Serializes the result rows to CSV and the metrics summary to a text report
 */
export class ReportWriterService {
  constructor(
    private readonly options: ReportWriterOptions,
    private readonly logger: Logger
  ) {}

  async writeResults(results: readonly DomainResult[]): Promise<string> {
    const path = join(this.options.outputDir, this.options.resultsFile);
    this.logger.info(`Exporting results to ${path}`);

    await mkdir(this.options.outputDir, { recursive: true });
    await writeFile(path, formatResultsCsv(results), 'utf-8');
    return path;
  }

  async writeMetrics(summary: MetricsSummary): Promise<string> {
    const path = join(this.options.outputDir, this.options.metricsFile);
    this.logger.info(`Exporting metrics to ${path}`);

    await mkdir(this.options.outputDir, { recursive: true });
    await writeFile(path, formatMetricsReport(summary), 'utf-8');
    return path;
  }
}

export function formatResultsCsv(results: readonly DomainResult[]): string {
  const rows = results.map((r) => [
    r.url,
    r.success ? 'True' : 'False',
    r.logoLink ?? 'None',
    r.requestType === 'none' ? 'None' : r.requestType,
    r.message,
  ]);

  const body = Papa.unparse(rows, { quotes: QUOTED_COLUMNS, newline: '\n', header: false });
  return body ? `${RESULTS_HEADER}\n${body}\n` : `${RESULTS_HEADER}\n`;
}

function line(label: string, { count, percentage }: CategoryCount): string {
  return `${label}: ${count} (${percentage.toFixed(2)}%)`;
}

function messageLines(entries: readonly MessageCount[]): string[] {
  return entries.map((e) => line(`- ${e.message}`, e));
}

export function formatMetricsReport(summary: MetricsSummary): string {
  const lines = [
    `Total domains processed: ${summary.total}`,
    line('Successful logo extractions', summary.successful),
    line('Failed extractions', summary.failed),
    '',
    'Failure Breakdown:',
    line('- Connection failures', summary.failures.connection),
    line('- Logo not found', summary.failures.notFound),
    line('- Other failures', summary.failures.other),
    '',
    'Request Types:',
    line('- Headed requests', summary.requestTypes.headed),
    line('- Headless requests', summary.requestTypes.headless),
    line('- Failed requests', summary.requestTypes.failed),
    '',
    'Logo sources:',
    ...messageLines(summary.successMessages),
    '',
    'Common error messages:',
    ...messageLines(summary.failureMessages),
  ];

  return `${lines.join('\n')}\n`;
}
