import type { CrawlerOptions } from '../config';
import type { FetchOutcome, FetchedPage, RequestMode } from '../types';
import type { Logger } from '../utils/logger';
import { describeFailure, type HttpResponse, type HttpTransport } from './http-transport';

type AttemptMode = Exclude<RequestMode, 'none'>;

type AttemptResult =
  | { ok: true; response: HttpResponse }
  | { ok: false; reason: string };

/**
 * DomainFetcherService
 * Resolves a bare domain to a fetched page by walking the protocol prefixes,
 * trying a headed then a headless request for each candidate URL
 */
export class DomainFetcherService {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: Pick<CrawlerOptions, 'timeoutMs' | 'protocolPrefixes' | 'headedHeaders'>,
    private readonly logger: Logger
  ) {}

  async fetch(domain: string): Promise<FetchOutcome> {
    let lastFailure: string | undefined;
    let candidateUrl: string | undefined;

    for (const prefix of this.options.protocolPrefixes) {
      candidateUrl = prefix + domain;

      for (const mode of ['headed', 'headless'] as const) {
        const attempt = await this.attempt(candidateUrl, mode);

        if (attempt.ok) {
          this.logger.debug(`${domain}: ${mode} request to ${candidateUrl} answered ${attempt.response.statusCode}`);
          return {
            resolvedUrl: candidateUrl,
            page: this.toPage(candidateUrl, attempt.response),
            requestMode: mode,
          };
        }

        // Only the most recent failure is kept
        lastFailure = attempt.reason;
        this.logger.debug(`${domain}: ${mode} request to ${candidateUrl} failed (${attempt.reason})`);
      }
    }

    return {
      resolvedUrl: undefined,
      page: undefined,
      requestMode: 'none',
      fetchError: lastFailure ?? 'Error NoProtocols',
    };
  }

  private async attempt(url: string, mode: AttemptMode): Promise<AttemptResult> {
    try {
      const response = await this.transport.get(url, {
        headers: mode === 'headed' ? this.options.headedHeaders : undefined,
        timeoutMs: this.options.timeoutMs,
      });
      return { ok: true, response };
    } catch (error) {
      return { ok: false, reason: describeFailure(error) };
    }
  }

  private toPage(requestedUrl: string, response: HttpResponse): FetchedPage {
    return {
      requestedUrl,
      url: response.url,
      statusCode: response.statusCode,
      contentType: response.contentType,
      html: response.body,
    };
  }
}
