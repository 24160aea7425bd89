import type { DomainResult } from './logo.types';

export interface StoredDomainResult extends DomainResult {
  _id?: string;
  runId: string;
  index: number;
  domain: string;
  storedAt: Date;
}

export interface RunReport {
  runId: string;
  resultsPath: string;
  metricsPath: string;
  storedCount?: number;
}

export * from './logo.types';
