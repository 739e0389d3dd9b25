import type { ExtractionResult } from './house.types';

export interface FetchedDocument {
  url: string;
  status: number;
  contentType?: string;
  body: Buffer;
  fetchedAt: Date;
}

export interface StoredExtraction {
  uniqueKey: string; // world:town:type
  storedAt: Date;
  result: ExtractionResult;
}

export * from './house.types';
