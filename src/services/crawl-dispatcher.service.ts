import pLimit from 'p-limit';
import type { DomainResult, DomainTask, FetchOutcome, LogoMatch } from '../types';
import { NOT_FOUND_MESSAGE } from '../types';
import type { Logger } from '../utils/logger';
import { describeFailure } from './http-transport';
import type { DomainFetcherService } from './domain-fetcher.service';
import type { LogoDetectorService } from './logo-detector.service';

/**
 * CrawlDispatcherService
 * Runs fetch -> detect for every domain on a bounded pool and returns the
 * results in input order
 */
export class CrawlDispatcherService {
  private readonly concurrency: number;

  constructor(
    private readonly fetcher: Pick<DomainFetcherService, 'fetch'>,
    private readonly detector: Pick<LogoDetectorService, 'detect'>,
    concurrency: number,
    private readonly logger: Logger
  ) {
    this.concurrency = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
  }

  async run(domains: readonly string[]): Promise<DomainResult[]> {
    const limit = pLimit(this.concurrency);
    this.logger.info(`Running crawler with ${this.concurrency} worker(s) for ${domains.length} domain(s)`);

    // Promise.all keeps index order whatever the completion order
    return Promise.all(domains.map((domain, index) => limit(() => this.processTask({ domain, index }))));
  }

  private async processTask(task: DomainTask): Promise<DomainResult> {
    this.logger.debug(`Fetching: ${task.domain}`);

    try {
      const outcome = await this.fetcher.fetch(task.domain);
      const match = outcome.page ? await this.detector.detect(outcome.page) : null;
      const result = buildDomainResult(task, outcome, match);

      this.logger.debug(`${task.domain}: ${result.success ? 'found' : 'failed'} (${result.message})`);
      return result;
    } catch (error) {
      this.logger.error(`Unexpected failure while crawling ${task.domain}:`, error);
      return {
        url: task.domain,
        success: false,
        requestType: 'none',
        message: describeFailure(error),
      };
    }
  }
}

export function buildDomainResult(task: DomainTask, outcome: FetchOutcome, match: LogoMatch | null): DomainResult {
  if (!outcome.page || outcome.requestMode === 'none') {
    return {
      url: task.domain,
      success: false,
      requestType: 'none',
      message: outcome.fetchError || 'Error Unknown',
    };
  }

  const url = outcome.resolvedUrl || task.domain;

  if (!match) {
    return { url, success: false, requestType: outcome.requestMode, message: NOT_FOUND_MESSAGE };
  }

  return {
    url,
    logoLink: match.url,
    success: true,
    requestType: outcome.requestMode,
    message: match.source,
  };
}
