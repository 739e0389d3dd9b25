import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { ContainerNotFoundError, TownNotFoundError } from '../errors';
import { fail, ok, type ListingRequest, type RawHouseRow, type Result, type RowFailure } from '../types';
import {
  type ColumnMap,
  type ContainerAnchor,
  type LabelledField,
  LABELLED_FIELDS,
  findListingCaption,
  ownRows,
  readHeader,
} from './anchor-strategies/base.strategy';
import { CaptionTextStrategy } from './anchor-strategies/caption-text.strategy';
import { HeaderLabelsStrategy } from './anchor-strategies/header-labels.strategy';
import { HouseIdInputStrategy } from './anchor-strategies/house-id-input.strategy';
import { sanitizeText } from './field-normalizer';

export interface RowExtraction {
  anchor: string;
  rows: Array<Result<RawHouseRow, RowFailure>>;
}

/**
 * HouseExtractorService
 * Stateless: locates the listing container and reads raw cell text per row
 */
export class HouseExtractorService {
  private anchors: ContainerAnchor[] = [];

  constructor() {
    // Order matters: the first anchor that matches wins
    this.registerAnchor(new HeaderLabelsStrategy());
    this.registerAnchor(new CaptionTextStrategy());
    this.registerAnchor(new HouseIdInputStrategy());
  }

  registerAnchor(anchor: ContainerAnchor): void {
    this.anchors.push(anchor);
  }

  getRegisteredAnchors(): string[] {
    return this.anchors.map((a) => a.name);
  }

  locateContainer($: CheerioAPI): { anchor: string; container: Cheerio<Element> } {
    for (const anchor of this.anchors) {
      const container = anchor.locate($);
      if (container) {
        return { anchor: anchor.name, container };
      }
    }

    throw new ContainerNotFoundError(this.getRegisteredAnchors());
  }

  /**
   * The caption names the town and world actually shown. If it disagrees
   * with the request, the site did not recognise what was asked for.
   */
  assertRequestedTown($: CheerioAPI, request: ListingRequest): void {
    const caption = findListingCaption($);
    if (!caption) return;

    const sameTown = caption.town.toLowerCase() === request.town.trim().toLowerCase();
    const sameWorld = caption.world.toLowerCase() === request.world.trim().toLowerCase();
    if (!sameTown || !sameWorld) {
      throw new TownNotFoundError(request.world, request.town, caption.text);
    }
  }

  extractRows($: CheerioAPI, request: ListingRequest): RowExtraction {
    this.assertRequestedTown($, request);
    const { anchor, container } = this.locateContainer($);

    const rows: Array<Result<RawHouseRow, RowFailure>> = [];
    let columns: ColumnMap | null = null;
    let index = 0;

    for (const tr of ownRows($, container).toArray()) {
      const $row = $(tr);

      if (!columns) {
        const header = readHeader($, $row);
        if (header.matched >= 2) {
          columns = header.columns;
          continue;
        }
      }

      if ($row.hasClass('LabelH')) continue;

      // Placeholder rows such as "No house found." span the whole table
      if ($row.children('td, th').length <= 1) continue;

      rows.push(this.readRow($, $row, index++, columns ?? {}));
    }

    return { anchor, rows };
  }

  private readRow(
    $: CheerioAPI,
    $row: Cheerio<Element>,
    row: number,
    columns: ColumnMap
  ): Result<RawHouseRow, RowFailure> {
    const cells = $row.children('td, th');
    const missing: string[] = [];

    const id = $row.find('input[name="houseid"]').first().attr('value');
    if (id === undefined) missing.push('id');

    const texts: Partial<Record<LabelledField, string>> = {};
    for (const field of LABELLED_FIELDS) {
      const column = columns[field];
      if (column === undefined || column >= cells.length) {
        missing.push(field);
        continue;
      }
      texts[field] = sanitizeText(cells.eq(column).text());
    }

    const { name, size, rent, status } = texts;
    if (
      id === undefined ||
      name === undefined ||
      size === undefined ||
      rent === undefined ||
      status === undefined
    ) {
      const failure: RowFailure = {
        row,
        kind: 'rowShapeMismatch',
        reason: `Missing columns: ${missing.join(', ')}`,
      };
      return fail(failure);
    }

    return ok({ row, cells: { id: id.trim(), name, size, rent, status } });
  }

  /**
   * Town names from the town picker on the houses subtopic page.
   */
  extractTowns($: CheerioAPI): string[] {
    const fromInputs = $('input[name="town"]')
      .toArray()
      .map((el) => sanitizeText($(el).attr('value') ?? ''));

    const names = fromInputs.some((name) => name.length > 0) ? fromInputs : this.townCellLabels($);

    const towns = [...new Set(names.filter((name) => name.length > 0))];
    if (towns.length === 0) {
      throw new ContainerNotFoundError(['townInputs', 'townLabels']);
    }

    return towns;
  }

  /**
   * Labels of the cell under the "Town" header of the search form. Other
   * columns (world, residence type) carry labels too.
   */
  private townCellLabels($: CheerioAPI): string[] {
    for (const tr of $('tr').toArray()) {
      const header = $(tr).children('td, th').toArray();
      const column = header.findIndex((cell) => sanitizeText($(cell).text()).toLowerCase() === 'town');
      if (column === -1) continue;

      return $(tr)
        .next('tr')
        .children('td, th')
        .eq(column)
        .find('label')
        .toArray()
        .map((el) => sanitizeText($(el).text()));
    }
    return [];
  }
}
