import * as cheerio from 'cheerio';
import { ParseError } from '../errors';
import { formatBillId } from '../ids';
import type { Chamber, VoteCast, VoteResult } from '../types';
import { buildAbsoluteUrl, cleanText, parseBillLink } from './helpers';

export interface VoteHistoryRow {
  rollCall: string;
  billId: string;
  billSession: string;
  billChamber: Chamber;
  billNumber: number;
  billUrl: string;
  document: string;
  motion: string;
  date: string;
  cast: VoteCast;
  castRaw: string;
  result: VoteResult;
  resultRaw: string;
}

interface ColumnMap {
  rollCall: number;
  document: number;
  motion: number;
  date: number;
  vote: number;
  result: number;
}

// Column layout of the vote history table when a header cannot be matched:
// RCS#, Doc., Subject/Motion, Date, Vote, Aye, No, Not Voting, Excused Abs.,
// Excused Vote, Total Votes, Result
const DEFAULT_COLUMNS: ColumnMap = {
  rollCall: 0,
  document: 1,
  motion: 2,
  date: 3,
  vote: 4,
  result: -1,
};

const COLUMN_PATTERNS: Record<keyof ColumnMap, RegExp> = {
  rollCall: /^rcs/i,
  document: /^doc/i,
  motion: /subject|motion/i,
  date: /^date/i,
  vote: /^vote$/i,
  result: /^result/i,
};

export function normalizeCast(raw: string): VoteCast {
  const value = raw.trim().toUpperCase();
  if (['AYE', 'AY', 'YES', 'Y', 'YEA'].includes(value)) return 'Aye';
  if (['NO', 'NAY', 'N'].includes(value)) return 'No';
  return 'Other';
}

export function normalizeResult(raw: string): VoteResult {
  const value = raw.trim().toUpperCase();
  if (value.includes('FAIL')) return 'Fail';
  if (value.includes('PASS') || value.includes('ADOPT')) return 'Pass';
  return 'Other';
}

function mapColumns(headers: string[]): ColumnMap {
  const columns = { ...DEFAULT_COLUMNS };
  const keys: (keyof ColumnMap)[] = ['rollCall', 'document', 'motion', 'date', 'vote', 'result'];
  for (const key of keys) {
    const index = headers.findIndex((header) => COLUMN_PATTERNS[key].test(header));
    if (index >= 0) columns[key] = index;
  }
  return columns;
}

/**
 * Parses one member's vote history. Rows whose document is not a bill page
 * (adjournment motions, resolutions without a bill lookup) are left out; an
 * empty table is a legitimate empty history.
 */
export function parseVoteHistory(
  html: string,
  options: { baseUrl: string; memberId: string }
): VoteHistoryRow[] {
  const $ = cheerio.load(html);

  const table = $('table')
    .filter((_, element) => {
      const header = cleanText($(element).find('tr').first().text());
      return /result/i.test(header) && /subject|motion/i.test(header);
    })
    .first();

  if (table.length === 0) {
    throw new ParseError(
      'vote-history',
      'vote table with Subject/Motion and Result columns',
      options.memberId
    );
  }

  const rows = table.find('tr');
  const headers = rows
    .first()
    .find('th, td')
    .toArray()
    .map((cell) => cleanText($(cell).text()));
  const columns = mapColumns(headers);

  const records: VoteHistoryRow[] = [];

  rows.slice(1).each((_, element) => {
    const row = $(element);
    const cells = row.find('td').toArray();
    if (cells.length < 5) return;

    const textAt = (index: number): string => {
      const cell = index < 0 ? cells[cells.length + index] : cells[index];
      return cell ? cleanText($(cell).text()) : '';
    };

    const link = row.find('a[href*="/BillLookup/"], a[href*="/BillLookUp/"]').first();
    const href = link.attr('href')?.trim() || '';
    const bill = parseBillLink(href);
    if (!bill) return;

    const castRaw = textAt(columns.vote);
    const resultRaw = textAt(columns.result);

    records.push({
      rollCall: textAt(columns.rollCall),
      billId: formatBillId(bill.session, bill.chamber, bill.number),
      billSession: bill.session,
      billChamber: bill.chamber,
      billNumber: bill.number,
      billUrl: buildAbsoluteUrl(href, options.baseUrl),
      document: textAt(columns.document) || cleanText(link.text()),
      motion: textAt(columns.motion),
      date: textAt(columns.date),
      cast: normalizeCast(castRaw),
      castRaw,
      result: normalizeResult(resultRaw),
      resultRaw,
    });
  });

  return records;
}
