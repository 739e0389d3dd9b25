import axios, { type AxiosInstance, type AxiosResponse, isAxiosError } from 'axios';
import { CONFIG } from '../config';
import { FetchError } from '../errors';
import type { FetchedDocument, ListingRequest, ResidenceType } from '../types';

const RESIDENCE_QUERY_VALUES: Record<ResidenceType, string> = {
  house: 'houses',
  guildhall: 'guildhalls',
};

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

export interface DocumentFetcherOptions {
  communityUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
}

/**
 * Source of raw listing pages. The live implementation is DocumentFetcher;
 * tests substitute captured fixture pages.
 */
export interface ListingPageSource {
  fetchResidencesPage(request: ListingRequest): Promise<FetchedDocument>;
  fetchTownsPage(): Promise<FetchedDocument>;
}

/**
 * DocumentFetcher
 * One GET per call against the community houses subtopic. No retries here:
 * the caller decides whether a failed page is worth another attempt.
 */
export class DocumentFetcher implements ListingPageSource {
  private readonly http: AxiosInstance;
  private readonly communityUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(http: AxiosInstance = axios.create(), options: DocumentFetcherOptions = {}) {
    this.http = http;
    this.communityUrl = options.communityUrl ?? CONFIG.tibia.communityUrl;
    this.userAgent = options.userAgent ?? CONFIG.tibia.userAgent;
    this.timeoutMs = options.timeoutMs ?? CONFIG.tibia.timeoutMs;
  }

  async fetchResidencesPage(request: ListingRequest): Promise<FetchedDocument> {
    return this.fetchPage({
      subtopic: 'houses',
      world: request.world,
      town: request.town,
      type: RESIDENCE_QUERY_VALUES[request.type],
    });
  }

  async fetchTownsPage(): Promise<FetchedDocument> {
    return this.fetchPage({ subtopic: 'houses' });
  }

  buildUrl(params: Record<string, string>): string {
    const url = new URL(this.communityUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async fetchPage(params: Record<string, string>): Promise<FetchedDocument> {
    const url = this.buildUrl(params);

    let response: AxiosResponse<ArrayBuffer>;
    try {
      response = await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
        // status handling is ours, not axios'
        validateStatus: () => true,
        maxRedirects: 5,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
          'Accept-Encoding': 'gzip, deflate, br',
        },
      });
    } catch (error) {
      throw this.toUnreachable(url, error);
    }

    if (response.status < 200 || response.status > 299) {
      console.warn(`⚠️  Upstream rejected ${url} with status ${response.status}`);
      throw FetchError.upstreamRejected(url, response.status);
    }

    const contentType = this.readContentType(response);
    if (!HTML_CONTENT_TYPES.some((type) => contentType.toLowerCase().includes(type))) {
      console.warn(`⚠️  Unexpected content type "${contentType}" from ${url}`);
      throw FetchError.unexpectedContentType(url, contentType);
    }

    return {
      url,
      status: response.status,
      contentType,
      body: Buffer.from(response.data),
      fetchedAt: new Date(),
    };
  }

  private readContentType(response: AxiosResponse<ArrayBuffer>): string {
    const value: unknown = response.headers['content-type'];
    return typeof value === 'string' ? value : '';
  }

  private toUnreachable(url: string, error: unknown): FetchError {
    if (isAxiosError(error)) {
      const timedOut = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
      console.error(`❌ Could not reach ${url} (${error.code ?? 'no code'}): ${error.message}`);
      return FetchError.unreachable(url, error.message, timedOut);
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(`❌ Could not reach ${url}: ${message}`);
    return FetchError.unreachable(url, message, false);
  }
}
