import * as cheerio from 'cheerio';
import { ParseError } from '../errors';
import { formatMemberId } from '../ids';
import type { Chamber } from '../types';
import { cleanText, parseBiographyLink, stripMemberTitle } from './helpers';

export interface ContactEntry {
  id: string;
  name: string;
  phone: string;
  email: string;
  assistant: string;
}

const PHONE_PATTERN = /\(?\d{3}\)?[-.\s]?\d{3}-\d{4}/;

function columnIndex(headers: string[], pattern: RegExp): number {
  return headers.findIndex((header) => pattern.test(header));
}

export function parseContactInfo(html: string, options: { chamber: Chamber }): ContactEntry[] {
  const $ = cheerio.load(html);
  const linkSelector = `a[href*="/Members/Biography/${options.chamber}/"]`;
  const rows = $('tr').filter((_, row) => $(row).find(linkSelector).length > 0);

  if (rows.length === 0) {
    throw new ParseError('contact-info', `table rows containing ${linkSelector}`);
  }

  const headers = rows
    .first()
    .closest('table')
    .find('tr')
    .first()
    .find('th')
    .toArray()
    .map((cell) => cleanText($(cell).text()).toLowerCase());
  const phoneColumn = columnIndex(headers, /phone/);
  const emailColumn = columnIndex(headers, /e-?mail/);
  const assistantColumn = columnIndex(headers, /assistant/);

  const contacts: ContactEntry[] = [];
  const seen = new Set<string>();

  rows.each((_, element) => {
    const row = $(element);
    const link = row.find(linkSelector).first();
    const parsed = parseBiographyLink(link.attr('href') || '');
    if (!parsed) return;

    const id = formatMemberId(parsed.chamber, parsed.seat);
    if (seen.has(id)) return;
    seen.add(id);

    const cells = row
      .find('td')
      .toArray()
      .map((cell) => cleanText($(cell).text()));
    const cellAt = (index: number): string => (index >= 0 ? (cells[index] ?? '') : '');

    const mailto = row.find('a[href^="mailto:"]').first().attr('href') || '';
    const email =
      mailto.replace(/^mailto:/i, '').split('?')[0]?.trim() ||
      (cellAt(emailColumn).includes('@') ? cellAt(emailColumn) : '');

    const phone =
      cellAt(phoneColumn).match(PHONE_PATTERN)?.[0] ??
      cleanText(row.text()).match(PHONE_PATTERN)?.[0] ??
      '';

    contacts.push({
      id,
      name: stripMemberTitle(cleanText(link.text())),
      phone,
      email,
      assistant: cellAt(assistantColumn),
    });
  });

  return contacts;
}
