import axios, { type AxiosInstance } from 'axios';
import { HttpServer } from '../../api/http-server';
import { FetchError } from '../../errors';
import { HouseListingService } from '../../services/house-listing.service';
import { FixturePageSource, fetched, loadFixture } from '../helpers/fixtures';

const NOW = new Date('2026-10-19T12:30:00Z');

describe('HTTP API Integration', () => {
  let server: HttpServer;
  let client: AxiosInstance;

  beforeAll(async () => {
    const source = new FixturePageSource({
      'antica:thais:house': fetched(loadFixture('houses-thais.html')),
      'antica:venore:house': fetched(loadFixture('maintenance.html')),
      'antica:edron:house': fetched(loadFixture('houses-thais.html')),
      'antica:ankrahmun:house': fetched(loadFixture('houses-redesigned.html')),
      'antica:darashia:house': FetchError.unreachable(
        'https://community.test/?subtopic=houses',
        'timeout of 50ms exceeded',
        true
      ),
      'antica:svargrond:house': new Error('boom'),
    });
    const listings = new HouseListingService(source, { clock: () => NOW });

    server = new HttpServer(listings, { port: 0, host: '127.0.0.1', enableLogging: false });
    const port = await server.start();

    client = axios.create({
      baseURL: `http://127.0.0.1:${port}`,
      validateStatus: () => true,
    });
  });

  afterAll(async () => {
    await server.stop();
  });

  it('should answer health checks', async () => {
    const response = await client.get('/health');

    expect(response.status).toBe(200);
    expect(response.data).toEqual({ status: 'ok' });
  });

  it('should list the towns', async () => {
    const response = await client.get('/api/v1/towns');

    expect(response.status).toBe(200);
    expect(response.data).toEqual(["Ab'Dendriel", 'Carlin', 'Port Hope', 'Thais', 'Venore']);
  });

  it('should serve a town listing as JSON', async () => {
    const response = await client.get('/api/v1/worlds/Antica/towns/Thais/houses');

    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({
      world: 'Antica',
      town: 'Thais',
      type: 'house',
      failures: [],
      rowCount: 5,
      empty: false,
    });
    expect(response.data.houses[2]).toEqual({
      id: 10103,
      world: 'Antica',
      town: 'Thais',
      type: 'house',
      name: 'Lower Swamp Lane 2',
      size: 190,
      rent: 100000,
      status: {
        type: 'auctionWithBid',
        bid: 15000,
        timeRemainingSeconds: 259200,
        expiryTime: '2026-10-22T08:00:00.000Z',
      },
    });
  });

  it('should reject an unknown residence type', async () => {
    const response = await client.get('/api/v1/worlds/Antica/towns/Thais/houses?type=castle');

    expect(response.status).toBe(400);
    expect(response.data).toEqual({
      code: 'INVALID_REQUEST',
      message: 'type must be one of: house, guildhall',
    });
  });

  it('should map maintenance to 503', async () => {
    const response = await client.get('/api/v1/worlds/Antica/towns/Venore/houses');

    expect(response.status).toBe(503);
    expect(response.data).toEqual({
      code: 'UPSTREAM_MAINTENANCE',
      message: 'The upstream website is currently undergoing maintenance',
    });
  });

  it('should map an unknown town to 404', async () => {
    const response = await client.get('/api/v1/worlds/Antica/towns/Edron/houses');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({
      code: 'TOWN_NOT_FOUND',
      message: 'No listing for town "Edron" on world "Antica"',
      details: {
        world: 'Antica',
        town: 'Edron',
        caption: 'Available Houses and Guildhalls in Thais on Antica',
      },
    });
  });

  it('should map a missing container to 502', async () => {
    const response = await client.get('/api/v1/worlds/Antica/towns/Ankrahmun/houses');

    expect(response.status).toBe(502);
    expect(response.data.code).toBe('CONTAINER_NOT_FOUND');
    expect(response.data.details).toEqual({ anchorsTried: ['headerLabels', 'captionText', 'houseIdInput'] });
  });

  it('should map an upstream timeout to 504', async () => {
    const response = await client.get('/api/v1/worlds/Antica/towns/Darashia/houses');

    expect(response.status).toBe(504);
    expect(response.data.details).toEqual({ url: 'https://community.test/?subtopic=houses', timedOut: true });
  });

  it('should hide unexpected failures behind a 500', async () => {
    const response = await client.get('/api/v1/worlds/Antica/towns/Svargrond/houses');

    expect(response.status).toBe(500);
    expect(response.data).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'Unexpected error while processing the upstream page',
    });
  });

  it('should aggregate residences of a town', async () => {
    const response = await client.get('/api/v1/worlds/Antica/residences?town=Thais&type=house');

    expect(response.status).toBe(200);
    expect(response.data.world).toBe('Antica');
    expect(response.data.residences).toHaveLength(5);
    expect(response.data.failures).toEqual([]);
    expect(response.data.empty).toBe(false);
  });

  it('should answer unknown routes with 404', async () => {
    const response = await client.get('/nope');

    expect(response.status).toBe(404);
    expect(response.data).toEqual({ code: 'NOT_FOUND', message: 'No route for GET /nope' });
  });
});
