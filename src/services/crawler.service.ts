import { defaultCrawlerOptions, type CrawlerOptions } from '../config';
import type { DomainResult, MetricsSummary } from '../types';
import type { Logger } from '../utils/logger';
import { CrawlDispatcherService } from './crawl-dispatcher.service';
import { DomainFetcherService } from './domain-fetcher.service';
import { AxiosTransport, type HttpTransport } from './http-transport';
import { LogoDetectorService } from './logo-detector.service';
import { MetricsService } from './metrics.service';

export interface CrawlOutcome {
  results: DomainResult[];
  summary: MetricsSummary;
}

/**
 * LogoCrawlerService
 * Wires fetcher, detector, dispatcher and metrics together. A pure function
 * of (domains, options) apart from the network transport.
 */
export class LogoCrawlerService {
  private readonly dispatcher: CrawlDispatcherService;
  private readonly metrics = new MetricsService();

  constructor(
    private readonly logger: Logger,
    options: Partial<CrawlerOptions> = {},
    transport: HttpTransport = new AxiosTransport()
  ) {
    const resolved = defaultCrawlerOptions(options);
    const fetcher = new DomainFetcherService(transport, resolved, logger);
    const detector = new LogoDetectorService(transport, resolved, logger);
    this.dispatcher = new CrawlDispatcherService(fetcher, detector, resolved.concurrency, logger);
  }

  async crawl(domains: readonly string[]): Promise<CrawlOutcome> {
    const results = await this.dispatcher.run(domains);
    const summary = this.metrics.summarize(results);

    this.logger.info(
      `Crawl complete: ${summary.successful.count}/${summary.total} logos found ` +
        `(${summary.successful.percentage.toFixed(2)}%)`
    );

    return { results, summary };
  }
}
