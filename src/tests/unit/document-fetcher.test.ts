import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { FetchError } from '../../errors';
import { DocumentFetcher } from '../../services/document-fetcher.service';

const COMMUNITY_URL = 'https://community.test/community/';

interface StubResponse {
  status?: number;
  contentType?: string;
  body?: string;
}

function stubAdapter(response: StubResponse, seen: InternalAxiosRequestConfig[]): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    return {
      data: Buffer.from(response.body ?? '<html><body><p>ok</p></body></html>'),
      status: response.status ?? 200,
      statusText: 'stub',
      headers: response.contentType === undefined ? {} : { 'content-type': response.contentType },
      config,
    };
  };
}

function failingAdapter(code: string, message: string): AxiosAdapter {
  return async (config) => {
    throw new AxiosError(message, code, config);
  };
}

function fetcherWith(adapter: AxiosAdapter): DocumentFetcher {
  return new DocumentFetcher(axios.create({ adapter }), {
    communityUrl: COMMUNITY_URL,
    userAgent: 'test-agent',
    timeoutMs: 50,
  });
}

describe('DocumentFetcher', () => {
  let seen: InternalAxiosRequestConfig[];

  beforeEach(() => {
    seen = [];
  });

  it('should request the houses subtopic for a town', async () => {
    const fetcher = fetcherWith(stubAdapter({ contentType: 'text/html; charset=utf-8' }, seen));

    const page = await fetcher.fetchResidencesPage({ world: 'Antica', town: 'Port Hope', type: 'guildhall' });

    expect(page.url).toBe(`${COMMUNITY_URL}?subtopic=houses&world=Antica&town=Port+Hope&type=guildhalls`);
    expect(page.status).toBe(200);
    expect(page.contentType).toBe('text/html; charset=utf-8');
    expect(page.body.toString('utf-8')).toBe('<html><body><p>ok</p></body></html>');
    expect(seen[0].url).toBe(page.url);
    expect(seen[0].timeout).toBe(50);
    expect(seen[0].headers['User-Agent']).toBe('test-agent');
  });

  it('should request the towns directory without a town', async () => {
    const fetcher = fetcherWith(stubAdapter({ contentType: 'text/html' }, seen));

    const page = await fetcher.fetchTownsPage();

    expect(page.url).toBe(`${COMMUNITY_URL}?subtopic=houses`);
  });

  it('should reject non-2xx answers', async () => {
    const fetcher = fetcherWith(stubAdapter({ status: 503, contentType: 'text/html' }, seen));

    await expect(fetcher.fetchTownsPage()).rejects.toMatchObject({
      reason: 'upstreamRejected',
      code: 'UPSTREAM_REJECTED',
      extra: { status: 503 },
    });
  });

  it('should reject payloads that are not HTML', async () => {
    const fetcher = fetcherWith(stubAdapter({ contentType: 'application/json', body: '{}' }, seen));

    await expect(fetcher.fetchTownsPage()).rejects.toMatchObject({
      code: 'UNEXPECTED_CONTENT_TYPE',
      extra: { contentType: 'application/json' },
    });
  });

  it('should reject answers without a content type', async () => {
    const fetcher = fetcherWith(stubAdapter({}, seen));

    await expect(fetcher.fetchTownsPage()).rejects.toThrow(
      `Expected an HTML page from ${COMMUNITY_URL}?subtopic=houses, got "no content type"`
    );
  });

  it('should flag timeouts as unreachable with timedOut set', async () => {
    const fetcher = fetcherWith(failingAdapter('ECONNABORTED', 'timeout of 50ms exceeded'));

    const error = await fetcher.fetchTownsPage().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      code: 'UPSTREAM_UNREACHABLE',
      message: `Could not reach ${COMMUNITY_URL}?subtopic=houses: timeout of 50ms exceeded`,
      extra: { timedOut: true },
    });
  });

  it('should report DNS failures as unreachable without timedOut', async () => {
    const fetcher = fetcherWith(failingAdapter('ENOTFOUND', 'getaddrinfo ENOTFOUND community.test'));

    await expect(fetcher.fetchTownsPage()).rejects.toMatchObject({
      code: 'UPSTREAM_UNREACHABLE',
      extra: { timedOut: false },
    });
  });
});
