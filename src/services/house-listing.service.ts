import { CONFIG } from '../config';
import { ContainerNotFoundError, isPageError } from '../errors';
import {
  RESIDENCE_TYPES,
  type ExtractionResult,
  type House,
  type ListingRequest,
  type ResidenceType,
  type RowFailure,
} from '../types';
import type { ListingPageSource } from './document-fetcher.service';
import { assertNotMaintenance, loadDocument } from './dom-loader.service';
import { HouseExtractorService } from './house-extractor.service';
import type { ListingCache } from './listing-cache.service';
import { assembleResult, buildHouse, type RowOutcome } from './record-assembler';

export interface HouseListingServiceOptions {
  extractor?: HouseExtractorService;
  cache?: ListingCache | null;
  clock?: () => Date;
  concurrency?: number;
}

export interface ResidencesQuery {
  town?: string;
  type?: ResidenceType;
}

export interface AggregatedResidences {
  world: string;
  residences: House[];
  failures: Array<RowFailure & { town: string; type: ResidenceType }>;
  empty: boolean;
}

/**
 * Run `task` over `items` with at most `limit` in flight; output keeps input
 * order. The first rejection rejects the whole batch and no further item is
 * started.
 */
async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  task: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await task(items[index]);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker));
  return results;
}

/**
 * HouseListingService
 * Fetch → load → extract → normalize → assemble for one listing page.
 * Holds no per-request state; the optional cache is the only thing shared.
 */
export class HouseListingService {
  private readonly source: ListingPageSource;
  private readonly extractor: HouseExtractorService;
  private readonly cache: ListingCache | null;
  private readonly clock: () => Date;
  private readonly concurrency: number;

  constructor(source: ListingPageSource, options: HouseListingServiceOptions = {}) {
    this.source = source;
    this.extractor = options.extractor ?? new HouseExtractorService();
    this.cache = options.cache ?? null;
    this.clock = options.clock ?? (() => new Date());
    this.concurrency = options.concurrency ?? CONFIG.tibia.concurrency;
  }

  async getListing(request: ListingRequest): Promise<ExtractionResult> {
    const cached = await this.readCache(request);
    if (cached) {
      console.log(`Serving cached ${request.type} listing for ${request.town} on ${request.world}`);
      return cached;
    }

    console.log(`🔍 Fetching ${request.type} listing for ${request.town} on ${request.world}`);

    try {
      const page = await this.source.fetchResidencesPage(request);
      const result = this.extractFromDocument(request, page.body, page.contentType);
      await this.writeCache(request, result);
      return result;
    } catch (error) {
      this.logPageError(request, error);
      throw error;
    }
  }

  /**
   * Run the parse/extract/normalize/assemble stages over bytes from any
   * source, such as a captured fixture page.
   */
  extractFromDocument(
    request: ListingRequest,
    body: Buffer | string,
    contentType?: string
  ): ExtractionResult {
    const $ = loadDocument(body, contentType);
    assertNotMaintenance($);

    const now = this.clock();
    const { anchor, rows } = this.extractor.extractRows($, request);

    const outcomes: RowOutcome[] = rows.map((raw) =>
      raw.ok
        ? { row: raw.value.row, result: buildHouse(raw.value, request, now) }
        : { row: raw.error.row, result: raw }
    );
    const result = assembleResult(request, outcomes);

    console.log(
      `✅ Extracted ${result.houses.length}/${result.rowCount} ${request.type} rows for ${request.town} on ${request.world} (anchor: ${anchor})`
    );
    if (result.failures.length > 0) {
      console.warn(
        `⚠️  ${result.failures.length} row(s) skipped for ${request.town}:`,
        result.failures.map((f) => `#${f.row} ${f.kind}: ${f.reason}`)
      );
    }

    return result;
  }

  async getTowns(): Promise<string[]> {
    const page = await this.source.fetchTownsPage();
    const $ = loadDocument(page.body, page.contentType);
    assertNotMaintenance($);

    try {
      return this.extractor.extractTowns($);
    } catch (error) {
      if (error instanceof ContainerNotFoundError) {
        console.error('🚨 Town directory not found on houses page; upstream markup has likely changed');
      }
      throw error;
    }
  }

  /**
   * Residences of a world across towns and types. Without a town every town
   * in the directory is queried; without a type both are.
   */
  async getResidences(world: string, query: ResidencesQuery = {}): Promise<AggregatedResidences> {
    const towns = query.town ? [query.town] : await this.getTowns();
    const types = query.type ? [query.type] : [...RESIDENCE_TYPES];

    const requests: ListingRequest[] = towns.flatMap((town) =>
      types.map((type) => ({ world, town, type }))
    );

    const results = await mapWithConcurrency(requests, this.concurrency, (request) =>
      this.getListing(request)
    );

    const residences = results.flatMap((result) => result.houses);
    const failures = results.flatMap((result) =>
      result.failures.map((failure) => ({ ...failure, town: result.town, type: result.type }))
    );

    return { world, residences, failures, empty: residences.length === 0 };
  }

  private async readCache(request: ListingRequest): Promise<ExtractionResult | null> {
    if (!this.cache) return null;
    try {
      return await this.cache.get(request);
    } catch (error) {
      console.error('Listing cache read failed, continuing without it:', error);
      return null;
    }
  }

  private async writeCache(request: ListingRequest, result: ExtractionResult): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.set(request, result);
    } catch (error) {
      console.error('Listing cache write failed:', error);
    }
  }

  private logPageError(request: ListingRequest, error: unknown): void {
    const target = `${request.type} listing for ${request.town} on ${request.world}`;
    if (!isPageError(error)) {
      console.error(`❌ Unexpected failure for ${target}:`, error);
      return;
    }

    switch (error.code) {
      case 'CONTAINER_NOT_FOUND':
        console.error(`🚨 Upstream format drift: ${error.message} (${target})`);
        break;
      case 'UPSTREAM_UNREACHABLE':
      case 'UPSTREAM_REJECTED':
      case 'UNEXPECTED_CONTENT_TYPE':
        console.error(`❌ Upstream outage for ${target}: ${error.message}`);
        break;
      default:
        console.warn(`⚠️  ${error.code} for ${target}: ${error.message}`);
    }
  }
}
