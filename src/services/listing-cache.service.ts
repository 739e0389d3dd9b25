import { MongoClient, type Collection, type Db } from 'mongodb';
import { CONFIG } from '../config';
import type { ExtractionResult, ListingRequest, StoredExtraction } from '../types';
import { ageResult } from './record-assembler';

/**
 * Short-lived store of successful extraction results, keyed by request.
 */
export interface ListingCache {
  get(request: ListingRequest): Promise<ExtractionResult | null>;
  set(request: ListingRequest, result: ExtractionResult): Promise<void>;
}

export function cacheKey(request: ListingRequest): string {
  return `${request.world}:${request.town}:${request.type}`.toLowerCase();
}

/**
 * ListingCacheService
 * MongoDB-backed ListingCache. Entries expire through a TTL index on
 * storedAt; reads check the age too, since the TTL monitor only runs about
 * once a minute.
 */
export class ListingCacheService implements ListingCache {
  private client: MongoClient;
  private db: Db | null = null;
  private collection: Collection<StoredExtraction> | null = null;
  private readonly ttlSeconds: number;

  constructor(uri: string = CONFIG.mongodb.uri, ttlSeconds: number = CONFIG.cache.ttlSeconds) {
    this.client = new MongoClient(uri);
    this.ttlSeconds = ttlSeconds;
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
      this.db = this.client.db(CONFIG.mongodb.database);
      this.collection = this.db.collection<StoredExtraction>('house_listings');

      await this.createIndexes();

      console.log(`Connected to MongoDB house_listings collection (ttl ${this.ttlSeconds}s)`);
    } catch (error) {
      console.error('Failed to connect to MongoDB (listing cache):', error);
      throw error;
    }
  }

  private async createIndexes(): Promise<void> {
    if (!this.collection) return;

    try {
      await this.collection.createIndex({ uniqueKey: 1 }, { unique: true });
      await this.collection.createIndex({ storedAt: 1 }, { expireAfterSeconds: this.ttlSeconds });
      console.log('MongoDB listing cache indexes created');
    } catch (error) {
      console.error('Failed to create listing cache indexes:', error);
    }
  }

  async get(request: ListingRequest): Promise<ExtractionResult | null> {
    if (!this.collection) {
      throw new Error('MongoDB not connected. Call connect() first.');
    }

    const entry = await this.collection.findOne(
      { uniqueKey: cacheKey(request) },
      { projection: { _id: 0 } }
    );
    if (!entry) return null;

    const ageMs = Date.now() - entry.storedAt.getTime();
    if (ageMs > this.ttlSeconds * 1000) return null;

    return ageResult(entry.result, Math.floor(ageMs / 1000));
  }

  async set(request: ListingRequest, result: ExtractionResult): Promise<void> {
    if (!this.collection) {
      throw new Error('MongoDB not connected. Call connect() first.');
    }

    const uniqueKey = cacheKey(request);
    const stored: StoredExtraction = { uniqueKey, storedAt: new Date(), result };

    await this.collection.replaceOne({ uniqueKey }, stored, { upsert: true });
  }

  async close(): Promise<void> {
    await this.client.close();
    this.db = null;
    this.collection = null;
    console.log('Listing cache connection closed');
  }
}
