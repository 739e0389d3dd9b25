import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { HouseField } from '../../types';
import { sanitizeText } from '../field-normalizer';

export type LabelledField = Exclude<HouseField, 'id'>;

export const LABELLED_FIELDS: readonly LabelledField[] = ['name', 'size', 'rent', 'status'];

/**
 * Header texts accepted for each labelled column.
 */
export const COLUMN_LABELS: Record<LabelledField, string[]> = {
  name: ['name'],
  size: ['size'],
  rent: ['rent'],
  status: ['status'],
};

export type ColumnMap = Partial<Record<LabelledField, number>>;

export interface HeaderMatch {
  columns: ColumnMap;
  matched: number;
}

/**
 * A structural anchor able to locate the listing table on a page.
 */
export interface ContainerAnchor {
  readonly name: string;
  locate($: CheerioAPI): Cheerio<Element> | null;
}

/**
 * Rows that belong to `table` itself, not to tables nested inside it.
 */
export function ownRows($: CheerioAPI, table: Cheerio<Element>): Cheerio<Element> {
  const tableNode = table.get(0);
  return table.find('tr').filter((_, tr) => $(tr).closest('table').get(0) === tableNode);
}

export function readHeader($: CheerioAPI, row: Cheerio<Element>): HeaderMatch {
  const columns: ColumnMap = {};
  let matched = 0;

  row.children('td, th').each((index, cell) => {
    const text = sanitizeText($(cell).text()).toLowerCase();
    for (const field of LABELLED_FIELDS) {
      if (columns[field] === undefined && COLUMN_LABELS[field].includes(text)) {
        columns[field] = index;
        matched++;
      }
    }
  });

  return { columns, matched };
}

// "Available Houses and Guildhalls in Thais on Antica"
const CAPTION_PATTERN = / in (.+) on (.+)$/i;

export interface ListingCaption {
  text: string;
  town: string;
  world: string;
  element: Cheerio<Element>;
}

export function findListingCaption($: CheerioAPI): ListingCaption | null {
  for (const el of $('.Text').toArray()) {
    const text = sanitizeText($(el).text());
    const match = text.match(CAPTION_PATTERN);
    if (match) {
      return { text, town: match[1], world: match[2], element: $(el) };
    }
  }
  return null;
}

/**
 * BaseAnchorStrategy
 * Shared helpers for container anchors
 */
export abstract class BaseAnchorStrategy implements ContainerAnchor {
  abstract readonly name: string;

  abstract locate($: CheerioAPI): Cheerio<Element> | null;

  protected hasFullHeader($: CheerioAPI, table: Cheerio<Element>): boolean {
    return ownRows($, table)
      .toArray()
      .some((tr) => readHeader($, $(tr)).matched === LABELLED_FIELDS.length);
  }

  protected firstOrNull(selection: Cheerio<Element>): Cheerio<Element> | null {
    return selection.length > 0 ? selection.first() : null;
  }
}
