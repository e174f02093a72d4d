import { ClassificationError } from './errors';
import type { ClassificationResult } from './types';

export interface ClassifierOptions {
  keywords: readonly string[];
  titleTerms: readonly string[];
}

export interface ClassifiableBill {
  id: string;
  title: string;
  rawKeywords: string | null;
}

/**
 * Splits a published Keywords field into upper-cased keywords. Missing or
 * blank fields raise ClassificationError.
 */
export function normalizeKeywords(billId: string, rawKeywords: string | null): string[] {
  if (rawKeywords === null) {
    throw new ClassificationError(billId, 'bill page has no Keywords field');
  }

  const keywords = rawKeywords
    .split(';')
    .map((keyword) => keyword.replace(/\s+/g, ' ').trim().toUpperCase())
    .filter(Boolean);

  if (keywords.length === 0) {
    throw new ClassificationError(billId, `Keywords field is empty or malformed: "${rawKeywords}"`);
  }

  return [...new Set(keywords)];
}

/** Case-insensitive substring match of the title terms, in order. */
export function matchTitleTerm(title: string, terms: readonly string[]): string | null {
  const haystack = title.toLowerCase();
  for (const term of terms) {
    const needle = term.trim().toLowerCase();
    if (needle && haystack.includes(needle)) {
      return term;
    }
  }
  return null;
}

export function classifyBill(
  bill: ClassifiableBill,
  options: ClassifierOptions
): ClassificationResult {
  const keywords = normalizeKeywords(bill.id, bill.rawKeywords);
  const configured = new Set(options.keywords.map((keyword) => keyword.trim().toUpperCase()));

  const matched = keywords.filter((keyword) => configured.has(keyword));
  if (matched.length > 0) {
    return {
      related: true,
      via: 'keyword',
      matched,
      reason: `keyword: ${matched.join('; ')}`,
    };
  }

  const term = matchTitleTerm(bill.title, options.titleTerms);
  if (term) {
    return {
      related: true,
      via: 'title-heuristic',
      matched: [term],
      reason: `title heuristic: ${term}`,
    };
  }

  return {
    related: false,
    via: 'none',
    matched: [],
    reason: 'no configured keyword or title term matched',
  };
}

/** Result recorded for a bill whose Keywords could not be read. */
export function unclassified(error: ClassificationError): ClassificationResult {
  return {
    related: false,
    via: 'unclassified',
    matched: [],
    reason: error.message,
  };
}
