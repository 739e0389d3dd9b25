import express, { type Request, type Response } from 'express';
import type { Server } from 'http';
import { CONFIG } from '../config';
import { FetchError, isPageError, type PageError } from '../errors';
import type { HouseListingService } from '../services/house-listing.service';
import { toErrorJson, toResidencesJson, toResultJson } from '../services/result-mapper';
import { RESIDENCE_TYPES, type ResidenceType } from '../types';

export interface HttpServerConfig {
  port: number;
  host: string;
  enableLogging: boolean;
}

/**
 * HTTP status for a page-level failure. The pipeline itself knows nothing
 * about HTTP; this is the only place its error codes meet status codes.
 */
export function statusForError(error: PageError): number {
  switch (error.code) {
    case 'UPSTREAM_UNREACHABLE':
      return error instanceof FetchError && error.extra.timedOut ? 504 : 502;
    case 'UPSTREAM_MAINTENANCE':
      return 503;
    case 'TOWN_NOT_FOUND':
      return 404;
    case 'UPSTREAM_REJECTED':
    case 'UNEXPECTED_CONTENT_TYPE':
    case 'MALFORMED_DOCUMENT':
    case 'CONTAINER_NOT_FOUND':
      return 502;
  }
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function parseResidenceType(value: unknown): ResidenceType | undefined | null {
  const raw = queryString(value);
  if (raw === undefined) return undefined;
  return RESIDENCE_TYPES.find((type) => type === raw.toLowerCase()) ?? null;
}

export class HttpServer {
  private app: express.Application;
  private server: Server | null = null;
  private config: HttpServerConfig;
  private listings: HouseListingService;

  constructor(listings: HouseListingService, config: Partial<HttpServerConfig> = {}) {
    this.listings = listings;
    this.config = {
      port: CONFIG.server.port,
      host: CONFIG.server.host,
      enableLogging: true,
      ...config,
    };

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    if (this.config.enableLogging) {
      this.app.use((req, res, next) => {
        const start = Date.now();
        res.on('finish', () => {
          const duration = Date.now() - start;
          console.log(`${req.method} ${req.path} - ${res.statusCode} - ${duration}ms`);
        });
        next();
      });
    }
  }

  private setupRoutes(): void {
    this.app.get('/health', (req, res) => {
      res.json({ status: 'ok' });
    });

    this.app.get('/api/v1/towns', async (req, res) => {
      try {
        res.json(await this.listings.getTowns());
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.get('/api/v1/worlds/:world/towns/:town/houses', async (req, res) => {
      const type = parseResidenceType(req.query.type);
      if (type === null) {
        this.sendInvalidType(res);
        return;
      }

      try {
        const result = await this.listings.getListing({
          world: req.params.world,
          town: req.params.town,
          type: type ?? 'house',
        });
        res.json(toResultJson(result));
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.get('/api/v1/worlds/:world/residences', async (req, res) => {
      const type = parseResidenceType(req.query.type);
      if (type === null) {
        this.sendInvalidType(res);
        return;
      }

      try {
        const aggregated = await this.listings.getResidences(req.params.world, {
          town: queryString(req.query.town),
          type,
        });
        res.json(toResidencesJson(aggregated));
      } catch (error) {
        this.sendError(res, error);
      }
    });

    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` });
    });
  }

  private sendInvalidType(res: Response): void {
    res.status(400).json({
      code: 'INVALID_REQUEST',
      message: `type must be one of: ${RESIDENCE_TYPES.join(', ')}`,
    });
  }

  private sendError(res: Response, error: unknown): void {
    if (isPageError(error)) {
      res.status(statusForError(error)).json(toErrorJson(error));
      return;
    }

    console.error('❌ Unhandled request error:', error);
    res.status(500).json(toErrorJson(error));
  }

  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        const port = typeof address === 'object' && address ? address.port : this.config.port;
        console.log(`🌐 HTTP server listening on ${this.config.host}:${port}`);
        resolve(port);
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      // keep-alive sockets would otherwise hold close() open
      server.closeIdleConnections();
    });
    this.server = null;
    console.log('HTTP server stopped');
  }
}
