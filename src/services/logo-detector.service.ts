import { load } from 'cheerio';
import type { CrawlerOptions } from '../config';
import type { FetchedPage, LogoMatch, LogoSource, LogoStrategy } from '../types';
import type { Logger } from '../utils/logger';
import type { HttpTransport } from './http-transport';
import { CommonPathStrategy } from './logo-strategies/common-path.strategy';
import { FaviconStrategy } from './logo-strategies/favicon.strategy';
import { ImgLogoStrategy } from './logo-strategies/img-logo.strategy';
import { OgImageStrategy } from './logo-strategies/og-image.strategy';

/**
 * LogoDetectorService
 * Stateless service that runs the logo strategies in priority order and
 * returns the first match
 */
export class LogoDetectorService {
  private strategies: LogoStrategy[] = [];

  constructor(
    transport: HttpTransport,
    options: Pick<CrawlerOptions, 'timeoutMs' | 'commonLogoPaths'>,
    private readonly logger: Logger
  ) {
    // Search order: common paths -> og:image -> img logo -> favicon
    this.registerStrategy(new CommonPathStrategy(transport, options, logger));
    this.registerStrategy(new OgImageStrategy());
    this.registerStrategy(new ImgLogoStrategy());
    this.registerStrategy(new FaviconStrategy());
  }

  /**
   * Register a new strategy after the existing ones
   */
  registerStrategy(strategy: LogoStrategy): void {
    this.strategies.push(strategy);
  }

  /**
   * Detect the logo of a fetched page. Null means no strategy matched.
   */
  async detect(page: FetchedPage): Promise<LogoMatch | null> {
    const parsed = { page, $: load(page.html) };

    for (const strategy of this.strategies) {
      try {
        const match = await strategy.tryDetect(parsed);
        if (match) return match;
      } catch (error) {
        this.logger.warn(`Strategy ${strategy.name} failed on ${page.url}:`, error);
      }
    }

    return null;
  }

  /**
   * Get list of registered strategy names, in priority order
   */
  getRegisteredStrategies(): LogoSource[] {
    return this.strategies.map((s) => s.name);
  }
}
