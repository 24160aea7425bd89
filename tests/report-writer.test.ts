import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MetricsService } from '../src/services/metrics.service';
import { formatMetricsReport, formatResultsCsv, ReportWriterService } from '../src/services/report-writer.service';
import type { DomainResult } from '../src/types';
import { silentLogger } from '../src/utils/logger';

const FOUND: DomainResult = {
  url: 'https://www.example.com',
  logoLink: 'https://www.example.com/brand.png',
  success: true,
  requestType: 'headed',
  message: 'og_image',
};

const UNREACHABLE: DomainResult = {
  url: 'example.org',
  success: false,
  requestType: 'none',
  message: 'Error ENOTFOUND',
};

describe('formatResultsCsv', () => {
  it('quotes logo_link and message and renders absent values as None', () => {
    expect(formatResultsCsv([FOUND, UNREACHABLE])).toBe(
      'url,success,logo_link,request_type,message\n' +
        'https://www.example.com,True,"https://www.example.com/brand.png",headed,"og_image"\n' +
        'example.org,False,"None",None,"Error ENOTFOUND"\n'
    );
  });

  it('escapes quotes inside messages', () => {
    const csv = formatResultsCsv([{ ...UNREACHABLE, message: 'bad "thing"' }]);

    expect(csv.split('\n')[1]).toBe('example.org,False,"None",None,"bad ""thing"""');
  });

  it('writes only the header for an empty run', () => {
    expect(formatResultsCsv([])).toBe('url,success,logo_link,request_type,message\n');
  });
});

describe('formatMetricsReport', () => {
  it('renders every section with two-decimal percentages', () => {
    const summary = new MetricsService().summarize([FOUND, UNREACHABLE]);

    expect(formatMetricsReport(summary)).toBe(
      [
        'Total domains processed: 2',
        'Successful logo extractions: 1 (50.00%)',
        'Failed extractions: 1 (50.00%)',
        '',
        'Failure Breakdown:',
        '- Connection failures: 1 (50.00%)',
        '- Logo not found: 0 (0.00%)',
        '- Other failures: 0 (0.00%)',
        '',
        'Request Types:',
        '- Headed requests: 1 (50.00%)',
        '- Headless requests: 0 (0.00%)',
        '- Failed requests: 1 (50.00%)',
        '',
        'Logo sources:',
        '- og_image: 1 (50.00%)',
        '',
        'Common error messages:',
        '- Error ENOTFOUND: 1 (50.00%)',
        '',
      ].join('\n')
    );
  });

  it('does not divide by zero for an empty run', () => {
    const report = formatMetricsReport(new MetricsService().summarize([]));

    expect(report.split('\n').slice(0, 3)).toEqual([
      'Total domains processed: 0',
      'Successful logo extractions: 0 (0.00%)',
      'Failed extractions: 0 (0.00%)',
    ]);
  });
});

describe('ReportWriterService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'logo-crawler-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates the output directory and writes both reports', async () => {
    const outputDir = join(dir, 'nested', 'output');
    const writer = new ReportWriterService({ outputDir, resultsFile: 'output.csv', metricsFile: 'metrics.txt' }, silentLogger);

    const resultsPath = await writer.writeResults([FOUND]);
    const metricsPath = await writer.writeMetrics(new MetricsService().summarize([FOUND]));

    expect(resultsPath).toBe(join(outputDir, 'output.csv'));
    expect(await readFile(resultsPath, 'utf-8')).toBe(formatResultsCsv([FOUND]));
    expect((await readFile(metricsPath, 'utf-8')).split('\n')[0]).toBe('Total domains processed: 1');
  });
});
