/**
 * Logo Crawler Types
 */

import type { CheerioAPI } from 'cheerio';

export type RequestMode = 'headed' | 'headless' | 'none';

export type LogoSource = 'common_path' | 'og_image' | 'img_logo' | 'favicon';

export const NOT_FOUND_MESSAGE = 'not_found';

export interface DomainTask {
  readonly domain: string;
  readonly index: number;
}

/**
 * A page obtained by the fetcher. `url` is the final URL after redirects
 * and is the base every logo candidate is resolved against.
 */
export interface FetchedPage {
  requestedUrl: string;
  url: string;
  statusCode: number;
  contentType?: string;
  html: string;
}

export interface FetchOutcome {
  resolvedUrl?: string;
  page?: FetchedPage;
  requestMode: RequestMode;
  fetchError?: string;
}

export interface LogoMatch {
  url: string;
  source: LogoSource;
}

export interface DomainResult {
  url: string;
  logoLink?: string;
  success: boolean;
  requestType: RequestMode;
  message: string;
}

export interface MessageCount {
  message: string;
  count: number;
  percentage: number;
}

export interface CategoryCount {
  count: number;
  percentage: number;
}

export interface MetricsSummary {
  total: number;
  successful: CategoryCount;
  failed: CategoryCount;
  failures: {
    connection: CategoryCount;
    notFound: CategoryCount;
    other: CategoryCount;
  };
  requestTypes: {
    headed: CategoryCount;
    headless: CategoryCount;
    failed: CategoryCount;
  };
  successMessages: MessageCount[];
  failureMessages: MessageCount[];
}

export interface LogoStrategy {
  readonly name: LogoSource;
  tryDetect(page: ParsedPage): Promise<LogoMatch | null>;
}

/**
 * A fetched page together with its parsed document, shared read-only by
 * every strategy of one detection run.
 */
export interface ParsedPage {
  page: FetchedPage;
  $: CheerioAPI;
}
