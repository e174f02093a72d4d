import { AggregationError } from './errors';
import { compareBillIds, compareMemberIds } from './ids';
import type {
  Bill,
  CountedAs,
  Member,
  MemberVoteDetail,
  RollCallMatrix,
  RollCallVote,
  Tally,
  VoteRecord,
} from './types';

export interface AggregateInput {
  members: Member[];
  bills: Bill[];
  voteRecords: VoteRecord[];
  /** Members whose vote history page was skipped in this build. */
  unavailableHistories?: ReadonlySet<string>;
}

export interface AggregateOptions {
  countableMotions: readonly string[];
}

export interface AggregateResult {
  tallies: Tally[];
  rollCall: RollCallMatrix;
  anomalies: AggregationError[];
}

interface CountedCell {
  cast: 'Aye' | 'No';
  time: number;
  index: number;
}

const ORDINALS: Record<string, string> = {
  first: '1st',
  second: '2nd',
  third: '3rd',
  fourth: '4th',
};

/** Lower-cased, whitespace collapsed, spelled ordinals folded ("Second" -> "2nd"). */
export function normalizeMotion(motion: string): string {
  return motion
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/\b(first|second|third|fourth)\b/g, (word) => ORDINALS[word] ?? word);
}

export function countableMotionSet(motions: readonly string[]): Set<string> {
  return new Set(motions.map(normalizeMotion));
}

export function countVote(
  record: Pick<VoteRecord, 'motion' | 'result' | 'cast'>,
  countableMotions: ReadonlySet<string>
): CountedAs {
  const counted =
    countableMotions.has(normalizeMotion(record.motion)) &&
    record.result === 'Pass' &&
    (record.cast === 'Aye' || record.cast === 'No');

  if (!counted) return 'not-counted';
  return record.cast === 'Aye' ? 'support' : 'oppose';
}

/**
 * Parses the "M/D/YYYY h:mm:ss AM" stamps of vote history pages. Unreadable
 * dates sort before everything else.
 */
export function parseVoteDate(date: string): number {
  const match = date
    .trim()
    .match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(AM|PM)?)?/i);

  if (match?.[1] && match[2] && match[3]) {
    let hours = match[4] ? parseInt(match[4], 10) : 0;
    const meridiem = match[7]?.toUpperCase();
    if (meridiem === 'PM' && hours < 12) hours += 12;
    if (meridiem === 'AM' && hours === 12) hours = 0;

    return Date.UTC(
      parseInt(match[3], 10),
      parseInt(match[1], 10) - 1,
      parseInt(match[2], 10),
      hours,
      match[5] ? parseInt(match[5], 10) : 0,
      match[6] ? parseInt(match[6], 10) : 0
    );
  }

  const parsed = Date.parse(date);
  return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
}

/**
 * Reduces vote records into per-member tallies and the roll-call matrix,
 * considering only bills classified as firefighter-related. Records that
 * point at an unknown member or a bill missing from the build are excluded
 * and returned as anomalies.
 */
export function aggregate(input: AggregateInput, options: AggregateOptions): AggregateResult {
  const countable = countableMotionSet(options.countableMotions);
  const billsById = new Map(input.bills.map((bill) => [bill.id, bill]));
  const members = [...input.members].sort((a, b) => compareMemberIds(a.id, b.id));

  const tallies = new Map<string, Tally>();
  for (const member of members) {
    tallies.set(member.id, {
      memberId: member.id,
      support: 0,
      oppose: 0,
      notCounted: 0,
      total: 0,
      historyAvailable: !input.unavailableHistories?.has(member.id),
    });
  }

  const counted = new Map<string, Map<string, CountedCell>>();
  const anomalies: AggregationError[] = [];

  input.voteRecords.forEach((record, index) => {
    const tally = tallies.get(record.memberId);
    if (!tally) {
      anomalies.push(
        new AggregationError(record.memberId, record.billId, 'member is not in the member list')
      );
      return;
    }

    const bill = billsById.get(record.billId);
    if (!bill) {
      anomalies.push(
        new AggregationError(
          record.memberId,
          record.billId,
          'bill page was not fetched or could not be parsed'
        )
      );
      return;
    }

    if (!bill.classification.related) return;

    tally.total++;
    const outcome = countVote(record, countable);
    if (outcome === 'not-counted') {
      tally.notCounted++;
      return;
    }
    if (outcome === 'support') {
      tally.support++;
    } else {
      tally.oppose++;
    }

    // Latest counted vote (by date, then page order) fills the cell
    const cells = counted.get(bill.id) ?? new Map<string, CountedCell>();
    counted.set(bill.id, cells);
    const time = parseVoteDate(record.date);
    const existing = cells.get(record.memberId);
    if (!existing || time > existing.time || (time === existing.time && index > existing.index)) {
      cells.set(record.memberId, { cast: outcome === 'support' ? 'Aye' : 'No', time, index });
    }
  });

  for (const anomaly of anomalies) {
    console.warn(anomaly.message);
  }

  const rollCallBills = [...counted.keys()].sort(compareBillIds);
  const cells: Record<string, Record<string, RollCallVote>> = {};
  for (const billId of rollCallBills) {
    const row: Record<string, RollCallVote> = {};
    for (const member of members) {
      row[member.id] = counted.get(billId)?.get(member.id)?.cast ?? 'NotVoting';
    }
    cells[billId] = row;
  }

  return {
    tallies: members.flatMap((member) => {
      const tally = tallies.get(member.id);
      return tally ? [tally] : [];
    }),
    rollCall: {
      bills: rollCallBills.map((id) => ({ id, title: billsById.get(id)?.title ?? '' })),
      members: members.map((member) => ({ id: member.id, name: member.name, party: member.party })),
      cells,
    },
    anomalies,
  };
}

const COUNTED_ORDER: Record<CountedAs, number> = { support: 0, oppose: 1, 'not-counted': 2 };

/**
 * One member's votes on firefighter-related bills, support first, then
 * oppose, then votes that were not counted.
 */
export function listMemberVotes(
  data: { bills: Bill[]; voteRecords: VoteRecord[] },
  memberId: string,
  options: AggregateOptions
): MemberVoteDetail[] {
  const countable = countableMotionSet(options.countableMotions);
  const billsById = new Map(data.bills.map((bill) => [bill.id, bill]));

  const details: MemberVoteDetail[] = [];
  for (const record of data.voteRecords) {
    if (record.memberId !== memberId) continue;
    const bill = billsById.get(record.billId);
    if (!bill?.classification.related) continue;

    details.push({
      billId: bill.id,
      billTitle: bill.title,
      billUrl: bill.url,
      keywords: bill.keywords,
      motion: record.motion,
      date: record.date,
      cast: record.cast,
      result: record.result,
      countedAs: countVote(record, countable),
    });
  }

  return details.sort(
    (a, b) =>
      COUNTED_ORDER[a.countedAs] - COUNTED_ORDER[b.countedAs] || compareBillIds(a.billId, b.billId)
  );
}
