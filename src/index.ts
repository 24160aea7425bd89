#!/usr/bin/env node
import { randomUUID } from 'crypto';
import { hideBin } from 'yargs/helpers';
import { formatDuration, formatRunSummary, parseCliArgs } from './cli';
import { CONFIG } from './config';
import { LogoCrawlerService } from './services/crawler.service';
import { InputLoaderService } from './services/input-loader.service';
import { ReportWriterService } from './services/report-writer.service';
import { ResultStorageService } from './services/result-storage.service';
import type { DomainResult, RunReport } from './types';
import { createConsoleLogger, type Logger } from './utils/logger';

async function main() {
  const startedAt = performance.now();
  const options = await parseCliArgs(hideBin(process.argv));
  const logger = createConsoleLogger(options.verbose);

  logger.info('Starting Logo Crawler...');
  logger.info(`Environment: ${CONFIG.nodeEnv}`);

  const domains = await new InputLoaderService().load(options.input);
  logger.info(`Successfully read ${domains.length} domain(s) from ${options.input}`);

  const crawler = new LogoCrawlerService(logger, {
    concurrency: options.concurrency,
    timeoutMs: options.timeoutSeconds * 1000,
  });
  const { results, summary } = await crawler.crawl(domains);

  const writer = new ReportWriterService(
    {
      outputDir: options.outputDir,
      resultsFile: options.resultsFile,
      metricsFile: options.metricsFile,
    },
    logger
  );

  const report: RunReport = {
    runId: randomUUID(),
    resultsPath: await writer.writeResults(results),
    metricsPath: await writer.writeMetrics(summary),
  };

  if (CONFIG.mongodb.uri) {
    report.storedCount = await persistResults(CONFIG.mongodb.uri, report.runId, results, logger);
  }

  logger.info(formatRunSummary(report));
  logger.info(`Crawler finished in ${formatDuration(performance.now() - startedAt)}`);
}

async function persistResults(
  uri: string,
  runId: string,
  results: DomainResult[],
  logger: Logger
): Promise<number | undefined> {
  const storage = new ResultStorageService(uri, CONFIG.mongodb.database, logger);

  try {
    await storage.connect();
    const stored = await storage.saveResults(runId, results);
    logger.info('MongoDB stats for this run:', await storage.getStats(runId));
    return stored;
  } catch (error) {
    // Reports are already on disk at this point
    logger.error('Failed to persist results:', error);
    return undefined;
  } finally {
    await storage.close();
  }
}

main().catch((error) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
