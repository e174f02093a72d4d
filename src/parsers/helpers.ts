import type { CheerioAPI } from 'cheerio';
import type { Chamber, PartyCode } from '../types';

export function cleanText(text: string | null | undefined): string {
  return text?.replace(/\s+/g, ' ').trim() || '';
}

export function buildAbsoluteUrl(href: string, baseUrl: string): string {
  // Reject unsafe schemes
  if (/^(javascript|data):/i.test(href)) return '';
  try {
    return new URL(href, baseUrl).toString();
  } catch (_error) {
    return '';
  }
}

export function parseBiographyLink(href: string): { chamber: Chamber; seat: number } | null {
  const match = href.match(/\/Members\/Biography\/([HS])\/(\d+)/i);
  if (!match?.[1] || !match[2]) return null;
  return {
    chamber: match[1].toUpperCase() === 'S' ? 'S' : 'H',
    seat: parseInt(match[2], 10),
  };
}

export function parseBillLink(
  href: string
): { session: string; chamber: Chamber; number: number } | null {
  const match = href.match(/\/BillLookup\/(\d{4}[A-Za-z0-9]*)\/([HS])(\d+)/i);
  if (!match?.[1] || !match[2] || !match[3]) return null;
  return {
    session: match[1],
    chamber: match[2].toUpperCase() === 'S' ? 'S' : 'H',
    number: parseInt(match[3], 10),
  };
}

export function normalizeParty(raw: string): PartyCode {
  const value = raw.trim().toUpperCase();
  if (value.startsWith('R')) return 'R';
  if (value.startsWith('D')) return 'D';
  return 'U';
}

export function stripMemberTitle(name: string): string {
  return name.replace(/^(Rep\.|Representative|Sen\.|Senator)\s+/i, '').trim();
}

/**
 * Elements whose cleaned text satisfies `test` and that contain no descendant
 * which also satisfies it, in document order.
 */
export function findDeepest($: CheerioAPI, test: (text: string) => boolean) {
  const matches = $('body *').filter((_, el) => test(cleanText($(el).text())));
  return matches.filter(
    (_, el) =>
      $(el)
        .find('*')
        .filter((__, child) => test(cleanText($(child).text()))).length === 0
  );
}

/**
 * Reads a "Label: value" pair. Handles the label in its own element with the
 * value in the next sibling, and the value inline after the label.
 */
export function findLabeledValue($: CheerioAPI, label: string): string | null {
  const exact = new RegExp(`^${label}\\s*:?$`, 'i');
  const prefix = new RegExp(`^${label}\\s*:\\s*`, 'i');

  const labelElement = findDeepest($, (text) => exact.test(text)).first();
  if (labelElement.length > 0) {
    const sibling = cleanText(labelElement.next().text());
    if (sibling) return sibling;
    const inline = cleanText(labelElement.parent().text());
    return inline.replace(prefix, '').replace(exact, '').trim();
  }

  const inlineElement = findDeepest($, (text) => prefix.test(text)).first();
  if (inlineElement.length > 0) {
    return cleanText(inlineElement.text()).replace(prefix, '').trim();
  }

  return null;
}
