import { MongoClient, type Collection, type Db, type Filter } from 'mongodb';
import type { DomainResult, StoredDomainResult } from '../types';
import type { Logger } from '../utils/logger';

/**
 * ResultStorageService
 * Persists crawl results to the `logo_results` collection, one document per
 * (run, input position)
 */
export class ResultStorageService {
  private client: MongoClient;
  private db: Db | null = null;
  private collection: Collection<StoredDomainResult> | null = null;

  constructor(
    uri: string,
    private readonly database: string,
    private readonly logger: Logger
  ) {
    this.client = new MongoClient(uri);
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.db = this.client.db(this.database);
      this.collection = this.db.collection<StoredDomainResult>('logo_results');

      await this.createIndexes();

      this.logger.info(`Connected to MongoDB: ${this.database}`);
    } catch (error) {
      this.logger.error('Failed to connect to MongoDB:', error);
      throw error;
    }
  }

  private async createIndexes(): Promise<void> {
    if (!this.collection) return;

    try {
      await this.collection.createIndex({ runId: 1, index: 1 }, { unique: true });
      await this.collection.createIndex({ url: 1 });
      await this.collection.createIndex({ success: 1 });
    } catch (error) {
      this.logger.warn('Failed to create indexes:', error);
    }
  }

  async saveResults(runId: string, results: readonly DomainResult[]): Promise<number> {
    if (!this.collection) {
      throw new Error('MongoDB not connected. Call connect() first.');
    }
    if (results.length === 0) return 0;

    const storedAt = new Date();
    const operations = results.map((result, index) => {
      const document = toStoredResult(runId, index, result, storedAt);
      return {
        updateOne: {
          filter: { runId, index },
          update: { $set: document },
          upsert: true,
        },
      };
    });

    const outcome = await this.collection.bulkWrite(operations, { ordered: false });
    const stored = outcome.upsertedCount + outcome.modifiedCount;
    this.logger.info(`Stored ${stored} result(s) for run ${runId}`);
    return stored;
  }

  async getStats(runId?: string): Promise<{
    total: number;
    successful: number;
    byMessage: Record<string, number>;
  }> {
    if (!this.collection) {
      throw new Error('MongoDB not connected. Call connect() first.');
    }

    const filter: Filter<StoredDomainResult> = runId ? { runId } : {};
    const total = await this.collection.countDocuments(filter);
    const successful = await this.collection.countDocuments({ ...filter, success: true });

    const grouped = await this.collection
      .aggregate<{ _id: string; count: number }>([
        { $match: filter },
        { $group: { _id: '$message', count: { $sum: 1 } } },
        { $sort: { count: -1 } },
      ])
      .toArray();

    const byMessage: Record<string, number> = {};
    grouped.forEach((entry) => {
      byMessage[entry._id] = entry.count;
    });

    return { total, successful, byMessage };
  }

  async close(): Promise<void> {
    await this.client.close();
    this.db = null;
    this.collection = null;
    this.logger.info('MongoDB connection closed');
  }
}

/**
 * Hostname of a result URL without the `www.` prefix; bare domains pass through
 */
export function extractDomain(url: string): string {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(url) ? url : `http://${url}`;
  try {
    return new URL(withScheme).hostname.replace(/^www\./, '');
  } catch {
    return url;
  }
}

export function toStoredResult(
  runId: string,
  index: number,
  result: DomainResult,
  storedAt: Date
): StoredDomainResult {
  return {
    ...result,
    runId,
    index,
    domain: extractDomain(result.url),
    storedAt,
  };
}
