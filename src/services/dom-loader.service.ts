import { load, type CheerioAPI } from 'cheerio';
import * as iconv from 'iconv-lite';
import { MalformedDocumentError, MaintenanceError } from '../errors';

export const MAINTENANCE_TITLE = 'Tibia - Free Multiplayer Online Role Playing Game - Maintenance';

const DEFAULT_CHARSET = 'utf-8';

// Meta tags must appear within the first 1024 bytes to be honoured by browsers
const SNIFF_LENGTH = 1024;

function bomCharset(body: Buffer): string | null {
  if (body[0] === 0xef && body[1] === 0xbb && body[2] === 0xbf) return 'utf-8';
  if (body[0] === 0xff && body[1] === 0xfe) return 'utf-16le';
  if (body[0] === 0xfe && body[1] === 0xff) return 'utf-16be';
  return null;
}

/**
 * Resolve the charset a page declares: byte order mark first, then the
 * Content-Type header, then a <meta charset> or http-equiv tag near the top
 * of the document.
 */
export function detectCharset(body: Buffer, contentType?: string): string {
  const fromBom = bomCharset(body);
  if (fromBom) return fromBom;

  const fromHeader = contentType?.match(/charset\s*=\s*["']?([\w.:-]+)/i)?.[1];
  if (fromHeader && iconv.encodingExists(fromHeader)) {
    return fromHeader.toLowerCase();
  }

  const head = body.subarray(0, SNIFF_LENGTH).toString('latin1');
  const fromMeta = head.match(/<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i)?.[1];
  if (fromMeta && iconv.encodingExists(fromMeta)) {
    return fromMeta.toLowerCase();
  }

  return DEFAULT_CHARSET;
}

export function decodeBody(body: Buffer | string, contentType?: string): string {
  if (typeof body === 'string') return body;
  return iconv.decode(body, detectCharset(body, contentType));
}

/**
 * Parse raw page bytes into a queryable document. Parsing is tolerant the way
 * browsers are; only input that is not markup at all is rejected.
 */
export function loadDocument(body: Buffer | string, contentType?: string): CheerioAPI {
  const text = decodeBody(body, contentType);

  if (text.trim().length === 0) {
    throw new MalformedDocumentError('The document is empty');
  }
  if (text.includes('\u0000')) {
    throw new MalformedDocumentError('The document contains binary data');
  }

  const $ = load(text);
  if ($('head').children().length === 0 && $('body').children().length === 0) {
    throw new MalformedDocumentError('The document contains no markup');
  }

  return $;
}

/**
 * The site answers 200 with a placeholder page while it is down.
 */
export function assertNotMaintenance($: CheerioAPI): void {
  const title = $('title').first().text().trim();
  if (title === MAINTENANCE_TITLE) {
    throw new MaintenanceError();
  }
}
