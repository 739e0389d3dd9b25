import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { BaseAnchorStrategy } from './base.strategy';

/**
 * HeaderLabelsStrategy
 * The table whose own header row carries every column label
 */
export class HeaderLabelsStrategy extends BaseAnchorStrategy {
  readonly name = 'headerLabels';

  locate($: CheerioAPI): Cheerio<Element> | null {
    const tables = $('table').filter((_, table) => this.hasFullHeader($, $(table)));
    return this.firstOrNull(tables);
  }
}
