import yargs from 'yargs';
import { CONFIG } from './config';
import type { RunReport } from './types';

export interface CliOptions {
  input: string;
  concurrency: number;
  timeoutSeconds: number;
  outputDir: string;
  resultsFile: string;
  metricsFile: string;
  verbose: boolean;
}

export async function parseCliArgs(args: string[]): Promise<CliOptions> {
  const argv = await yargs(args)
    .scriptName('logo-crawler')
    .usage('$0 --input <file> [options]')
    .option('input', { alias: 'i', type: 'string', demandOption: true, describe: 'domain list (.txt, .csv or .dat)' })
    .option('concurrency', { alias: 'c', type: 'number', default: CONFIG.crawler.concurrency })
    .option('timeout', { alias: 't', type: 'number', default: CONFIG.crawler.timeoutSeconds, describe: 'per-request timeout in seconds' })
    .option('output-dir', { alias: 'o', type: 'string', default: CONFIG.output.dir })
    .option('results-file', { type: 'string', default: CONFIG.output.resultsFile })
    .option('metrics-file', { type: 'string', default: CONFIG.output.metricsFile })
    .option('verbose', { alias: 'v', type: 'boolean', default: CONFIG.crawler.verbose })
    .strict()
    .parse();

  if (!Number.isInteger(argv.concurrency) || argv.concurrency < 1) {
    throw new Error(`Invalid --concurrency \`${argv.concurrency}\`: expected a positive integer`);
  }
  if (!Number.isFinite(argv.timeout) || argv.timeout <= 0) {
    throw new Error(`Invalid --timeout \`${argv.timeout}\`: expected a positive number of seconds`);
  }

  return {
    input: argv.input,
    concurrency: argv.concurrency,
    timeoutSeconds: argv.timeout,
    outputDir: argv['output-dir'],
    resultsFile: argv['results-file'],
    metricsFile: argv['metrics-file'],
    verbose: argv.verbose,
  };
}

export function formatDuration(ms: number): string {
  const totalSeconds = ms / 1000;
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}h ${minutes}m ${seconds.toFixed(2)}s`;
}

export function formatRunSummary(report: RunReport): string {
  const stored = report.storedCount === undefined ? '' : `, ${report.storedCount} stored in MongoDB`;
  return `Run ${report.runId}: results in ${report.resultsPath}, metrics in ${report.metricsPath}${stored}`;
}
