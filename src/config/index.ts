import { config } from 'dotenv';

config();

function parseNumber(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const CONFIG = {
  crawler: {
    timeoutSeconds: parseNumber(process.env.CRAWLER_TIMEOUT_SECONDS, 5),
    concurrency: parseNumber(process.env.CRAWLER_CONCURRENCY, 8),
    verbose: process.env.CRAWLER_VERBOSE === 'true',
  },
  output: {
    dir: process.env.CRAWLER_OUTPUT_DIR || 'output',
    resultsFile: process.env.CRAWLER_RESULTS_FILE || 'output.csv',
    metricsFile: process.env.CRAWLER_METRICS_FILE || 'metrics.txt',
  },
  mongodb: {
    uri: process.env.MONGODB_URI,
    database: process.env.MONGODB_DATABASE || 'logo_crawler',
  },
  nodeEnv: process.env.NODE_ENV || 'development',
} as const;

// Tried in order; the first prefix that answers wins.
export const PROTOCOL_PREFIXES: readonly string[] = ['https://www.', 'http://www.', 'www.'];

export const HEADED_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
  Connection: 'keep-alive',
  DNT: '1',
};

export const COMMON_LOGO_PATHS: readonly string[] = [
  '/logo.png',
  '/images/logo.png',
  '/static/logo.svg',
  '/assets/logo.png',
  '/img/logo.png',
];

export const ALLOWED_INPUT_EXTENSIONS: readonly string[] = ['txt', 'csv', 'dat'];

export interface CrawlerOptions {
  timeoutMs: number;
  concurrency: number;
  protocolPrefixes: readonly string[];
  headedHeaders: Readonly<Record<string, string>>;
  commonLogoPaths: readonly string[];
}

export function defaultCrawlerOptions(overrides: Partial<CrawlerOptions> = {}): CrawlerOptions {
  return {
    timeoutMs: CONFIG.crawler.timeoutSeconds * 1000,
    concurrency: CONFIG.crawler.concurrency,
    protocolPrefixes: PROTOCOL_PREFIXES,
    headedHeaders: HEADED_REQUEST_HEADERS,
    commonLogoPaths: COMMON_LOGO_PATHS,
    ...overrides,
  };
}
