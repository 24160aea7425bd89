import type { CrawlerOptions } from '../../config';
import type { LogoMatch, ParsedPage } from '../../types';
import type { Logger } from '../../utils/logger';
import type { HttpTransport } from '../http-transport';
import { BaseLogoStrategy } from './base.strategy';

/**
 * CommonPathStrategy
 * Probes conventional logo locations on the page's host with HEAD requests
 */
export class CommonPathStrategy extends BaseLogoStrategy {
  readonly name = 'common_path';

  constructor(
    private readonly transport: HttpTransport,
    private readonly options: Pick<CrawlerOptions, 'timeoutMs' | 'commonLogoPaths'>,
    private readonly logger: Logger
  ) {
    super();
  }

  async tryDetect({ page }: ParsedPage): Promise<LogoMatch | null> {
    for (const path of this.options.commonLogoPaths) {
      const candidate = this.resolveUrl(path, page.url);
      if (!candidate) continue;

      if (await this.probe(candidate)) {
        return { url: candidate, source: this.name };
      }
    }

    return null;
  }

  private async probe(url: string): Promise<boolean> {
    try {
      const response = await this.transport.head(url, { timeoutMs: this.options.timeoutMs });
      return response.statusCode === 200 && (response.contentType || '').includes('image');
    } catch (error) {
      this.logger.debug(`Probe of ${url} failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }
}
