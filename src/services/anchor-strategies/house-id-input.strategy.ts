import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { BaseAnchorStrategy } from './base.strategy';

/**
 * HouseIdInputStrategy
 * Every listing row posts a hidden houseid input; its table is the container.
 */
export class HouseIdInputStrategy extends BaseAnchorStrategy {
  readonly name = 'houseIdInput';

  locate($: CheerioAPI): Cheerio<Element> | null {
    const input = $('input[name="houseid"]').first();
    if (input.length === 0) return null;

    return this.firstOrNull(input.parents('table').first());
  }
}
