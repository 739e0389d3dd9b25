/**
 * Page-level failures. Any of these aborts the whole request; row-level
 * problems never surface here (see RowFailure).
 */

export type PageErrorCode =
  | 'UPSTREAM_UNREACHABLE'
  | 'UPSTREAM_REJECTED'
  | 'UNEXPECTED_CONTENT_TYPE'
  | 'MALFORMED_DOCUMENT'
  | 'CONTAINER_NOT_FOUND'
  | 'UPSTREAM_MAINTENANCE'
  | 'TOWN_NOT_FOUND';

export interface ErrorJson {
  code: string;
  message: string;
  details?: Record<string, string | number | boolean | string[]>;
}

export abstract class PageError extends Error {
  abstract readonly code: PageErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  details(): ErrorJson['details'] {
    return undefined;
  }

  toJSON(): ErrorJson {
    const details = this.details();
    return {
      code: this.code,
      message: this.message,
      ...(details && { details }),
    };
  }
}

export type FetchErrorReason = 'unreachable' | 'upstreamRejected' | 'unexpectedContentType';

const FETCH_ERROR_CODES: Record<FetchErrorReason, PageErrorCode> = {
  unreachable: 'UPSTREAM_UNREACHABLE',
  upstreamRejected: 'UPSTREAM_REJECTED',
  unexpectedContentType: 'UNEXPECTED_CONTENT_TYPE',
};

export class FetchError extends PageError {
  readonly code: PageErrorCode;

  constructor(
    readonly reason: FetchErrorReason,
    readonly url: string,
    message: string,
    readonly extra: { status?: number; contentType?: string; timedOut?: boolean } = {}
  ) {
    super(message);
    this.code = FETCH_ERROR_CODES[reason];
  }

  static unreachable(url: string, cause: string, timedOut: boolean): FetchError {
    return new FetchError('unreachable', url, `Could not reach ${url}: ${cause}`, { timedOut });
  }

  static upstreamRejected(url: string, status: number): FetchError {
    return new FetchError('upstreamRejected', url, `Upstream answered ${status} for ${url}`, {
      status,
    });
  }

  static unexpectedContentType(url: string, contentType: string): FetchError {
    return new FetchError(
      'unexpectedContentType',
      url,
      `Expected an HTML page from ${url}, got "${contentType || 'no content type'}"`,
      { contentType }
    );
  }

  details(): ErrorJson['details'] {
    return {
      url: this.url,
      ...(this.extra.status !== undefined && { status: this.extra.status }),
      ...(this.extra.contentType !== undefined && { contentType: this.extra.contentType }),
      ...(this.extra.timedOut && { timedOut: true }),
    };
  }
}

export class MalformedDocumentError extends PageError {
  readonly code = 'MALFORMED_DOCUMENT' as const;
}

export class ContainerNotFoundError extends PageError {
  readonly code = 'CONTAINER_NOT_FOUND' as const;

  constructor(readonly anchorsTried: string[]) {
    super('The page loaded but no listing container matched any anchor; upstream markup has likely changed');
  }

  details(): ErrorJson['details'] {
    return { anchorsTried: this.anchorsTried };
  }
}

export class MaintenanceError extends PageError {
  readonly code = 'UPSTREAM_MAINTENANCE' as const;

  constructor() {
    super('The upstream website is currently undergoing maintenance');
  }
}

export class TownNotFoundError extends PageError {
  readonly code = 'TOWN_NOT_FOUND' as const;

  constructor(
    readonly world: string,
    readonly town: string,
    readonly caption: string
  ) {
    super(`No listing for town "${town}" on world "${world}"`);
  }

  details(): ErrorJson['details'] {
    return { world: this.world, town: this.town, caption: this.caption };
  }
}

export function isPageError(error: unknown): error is PageError {
  return error instanceof PageError;
}
