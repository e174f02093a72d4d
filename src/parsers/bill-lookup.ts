import * as cheerio from 'cheerio';
import { ParseError } from '../errors';
import { cleanText, findDeepest, findLabeledValue } from './helpers';

export interface BillPage {
  title: string;
  rawKeywords: string | null;
}

const BILL_HEADER_PATTERN = /^(House|Senate)\s+(Bill|Joint\s+Resolution|Resolution)\s+\d+$/i;

/**
 * Extracts the short title and the verbatim Keywords text of a bill page.
 * A page without a Keywords label still parses (rawKeywords is null) so the
 * classifier can report the gap; a page without a bill header or title label
 * does not.
 */
export function parseBillPage(html: string, options: { billId: string }): BillPage {
  const $ = cheerio.load(html);

  let title = findLabeledValue($, '(?:Short\\s+)?Title') || '';

  if (!title) {
    const header = findDeepest($, (text) => BILL_HEADER_PATTERN.test(text)).first();
    if (header.length === 0) {
      throw new ParseError('bill-lookup', 'bill header or title label', options.billId);
    }

    const candidates = [...header.nextAll().toArray(), ...header.parent().nextAll().toArray()];
    for (const candidate of candidates) {
      const text = cleanText($(candidate).text());
      if (text && !BILL_HEADER_PATTERN.test(text) && !/^Keywords\s*:/i.test(text)) {
        title = text;
        break;
      }
    }

    if (!title) {
      title = cleanText($('title').text());
    }
  }

  if (!title) {
    throw new ParseError('bill-lookup', 'bill title', options.billId);
  }

  return {
    title,
    rawKeywords: findLabeledValue($, 'Keywords'),
  };
}
