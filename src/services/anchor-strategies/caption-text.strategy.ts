import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { BaseAnchorStrategy, findListingCaption } from './base.strategy';

/**
 * CaptionTextStrategy
 * Finds the "... in <town> on <world>" caption and takes the content table
 * of the box it heads.
 */
export class CaptionTextStrategy extends BaseAnchorStrategy {
  readonly name = 'captionText';

  locate($: CheerioAPI): Cheerio<Element> | null {
    const caption = findListingCaption($);
    if (!caption) return null;

    const box = caption.element.closest('.TableContainer');
    return this.firstOrNull(box.find('table.TableContent'));
  }
}
