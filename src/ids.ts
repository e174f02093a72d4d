import type { Chamber } from './types';

const MEMBER_ID_PATTERN = /^([HS])-(\d+)$/;
const BILL_ID_PATTERN = /^(.+)-([HS])(\d+)$/;

export function formatMemberId(chamber: Chamber, seat: number): string {
  return `${chamber}-${seat}`;
}

export function parseMemberId(id: string): { chamber: Chamber; seat: number } | null {
  const match = id.match(MEMBER_ID_PATTERN);
  if (!match?.[1] || !match[2]) return null;
  return { chamber: match[1] === 'S' ? 'S' : 'H', seat: parseInt(match[2], 10) };
}

export function formatBillId(session: string, chamber: Chamber, number: number): string {
  return `${session}-${chamber}${number}`;
}

export function parseBillId(
  id: string
): { session: string; chamber: Chamber; number: number } | null {
  const match = id.match(BILL_ID_PATTERN);
  if (!match?.[1] || !match[2] || !match[3]) return null;
  return {
    session: match[1],
    chamber: match[2] === 'S' ? 'S' : 'H',
    number: parseInt(match[3], 10),
  };
}

export function compareMemberIds(a: string, b: string): number {
  const left = parseMemberId(a);
  const right = parseMemberId(b);
  if (!left || !right) return a.localeCompare(b);
  return left.chamber.localeCompare(right.chamber) || left.seat - right.seat;
}

export function compareBillIds(a: string, b: string): number {
  const left = parseBillId(a);
  const right = parseBillId(b);
  if (!left || !right) return a.localeCompare(b);
  return (
    left.session.localeCompare(right.session) ||
    left.chamber.localeCompare(right.chamber) ||
    left.number - right.number
  );
}
