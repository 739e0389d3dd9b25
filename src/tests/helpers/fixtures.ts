import { readFileSync } from 'fs';
import { join } from 'path';
import type { ListingPageSource } from '../../services/document-fetcher.service';
import { cacheKey, type ListingCache } from '../../services/listing-cache.service';
import type { ExtractionResult, FetchedDocument, ListingRequest } from '../../types';

const FIXTURES_DIR = join(__dirname, '..', 'fixtures');

export const HTML = 'text/html; charset=utf-8';

export function loadFixture(name: string): Buffer {
  return readFileSync(join(FIXTURES_DIR, name));
}

export function fetched(body: Buffer | string, contentType = HTML): FetchedDocument {
  return {
    url: 'https://community.test/?subtopic=houses',
    status: 200,
    contentType,
    body: typeof body === 'string' ? Buffer.from(body, 'utf-8') : body,
    fetchedAt: new Date('2026-10-19T12:30:00Z'),
  };
}

type PageOutcome = FetchedDocument | Error;

/**
 * Serves canned pages per request key ("world:town:type", lowercased) and
 * records every call. Unknown keys get an empty listing for that town.
 */
export class FixturePageSource implements ListingPageSource {
  readonly requests: ListingRequest[] = [];
  townsRequests = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private readonly pages: Record<string, PageOutcome>,
    private readonly towns: PageOutcome = fetched(loadFixture('towns.html'))
  ) {}

  async fetchResidencesPage(request: ListingRequest): Promise<FetchedDocument> {
    this.requests.push(request);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      // let other workers start before this one settles
      await new Promise((resolve) => setImmediate(resolve));
      return this.unwrap(
        this.pages[cacheKey(request)] ?? fetched(listingPage([], { town: request.town, world: request.world }))
      );
    } finally {
      this.inFlight--;
    }
  }

  async fetchTownsPage(): Promise<FetchedDocument> {
    this.townsRequests++;
    return this.unwrap(this.towns);
  }

  private unwrap(outcome: PageOutcome): FetchedDocument {
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

export class InMemoryListingCache implements ListingCache {
  readonly entries = new Map<string, ExtractionResult>();
  failing = false;

  async get(request: ListingRequest): Promise<ExtractionResult | null> {
    if (this.failing) throw new Error('cache offline');
    return this.entries.get(cacheKey(request)) ?? null;
  }

  async set(request: ListingRequest, result: ExtractionResult): Promise<void> {
    if (this.failing) throw new Error('cache offline');
    this.entries.set(cacheKey(request), result);
  }
}

export interface ListingRow {
  id?: string;
  cells: string[];
}

/**
 * Minimal listing page in the upstream layout.
 */
export function listingPage(
  rows: ListingRow[],
  options: { town?: string; world?: string; header?: string[] } = {}
): string {
  const { town = 'Thais', world = 'Antica', header = ['Name', 'Size', 'Rent', 'Status', ''] } = options;

  const body = rows
    .map((row) => {
      const cells = row.cells.map((cell) => `<td><nobr>${cell}</nobr></td>`).join('');
      const form =
        row.id === undefined ? '' : `<td><form><input type="hidden" name="houseid" value="${row.id}"></form></td>`;
      return `<tr>${cells}${form}</tr>`;
    })
    .join('\n');

  return `<html><head><title>Community</title></head><body>
<div class="TableContainer"><table class="Table3">
<tr><td><div class="Text">Available Houses and Guildhalls in ${town} on ${world}</div></td></tr>
<tr><td><table class="TableContent">
<tr class="LabelH">${header.map((label) => `<td>${label}</td>`).join('')}</tr>
${body}
</table></td></tr>
</table></div>
</body></html>`;
}
