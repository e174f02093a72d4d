import { expect, test } from '@playwright/test';
import {
  aggregate,
  countableMotionSet,
  countVote,
  listMemberVotes,
  normalizeMotion,
  parseVoteDate,
} from '../src/aggregator';
import { COUNTABLE_MOTIONS } from '../src/constants';
import type { Bill, Member, VoteRecord } from '../src/types';

const options = { countableMotions: COUNTABLE_MOTIONS };

function member(seat: number, name: string): Member {
  return {
    id: `H-${seat}`,
    chamber: 'H',
    seat,
    name,
    party: 'D',
    partyIcon: '🫏 D',
    district: String(seat),
    counties: [],
    phone: '',
    assistant: '',
    email: '',
    profileUrl: `https://legislature.test/Members/Biography/H/${seat}`,
    voteHistoryUrl: `https://legislature.test/Members/Votes/H/${seat}`,
  };
}

function bill(number: number, related: boolean): Bill {
  return {
    id: `2025-H${number}`,
    session: '2025',
    chamber: 'H',
    number,
    url: `https://legislature.test/BillLookup/2025/H${number}`,
    title: `House Bill ${number}`,
    keywords: related ? ['EMS'] : ['TAXATION'],
    rawKeywords: related ? 'EMS' : 'TAXATION',
    classification: related
      ? { related: true, via: 'keyword', matched: ['EMS'], reason: 'keyword: EMS' }
      : { related: false, via: 'none', matched: [], reason: 'no configured keyword or title term matched' },
  };
}

function vote(
  memberId: string,
  billId: string,
  overrides: Partial<Omit<VoteRecord, 'memberId' | 'billId'>> = {}
): VoteRecord {
  return {
    memberId,
    billId,
    rollCall: '1',
    date: '3/12/2025 2:30:55 PM',
    motion: '2nd Reading',
    cast: 'Aye',
    castRaw: 'Aye',
    result: 'Pass',
    resultRaw: 'PASS',
    ...overrides,
  };
}

test.describe('Vote aggregation', () => {
  test('should count a passed 2nd Reading Aye as support', () => {
    const result = aggregate(
      { members: [member(1, 'Jane Smith')], bills: [bill(10, true)], voteRecords: [vote('H-1', '2025-H10')] },
      options
    );

    expect(result.tallies).toEqual([
      { memberId: 'H-1', support: 1, oppose: 0, notCounted: 0, total: 1, historyAvailable: true },
    ]);
    expect(result.rollCall.bills).toEqual([{ id: '2025-H10', title: 'House Bill 10' }]);
    expect(result.rollCall.cells['2025-H10']?.['H-1']).toBe('Aye');
    expect(result.anomalies).toEqual([]);
  });

  test('should not count a failed motion and leave it out of the roll call', () => {
    const result = aggregate(
      {
        members: [member(1, 'Jane Smith')],
        bills: [bill(10, true)],
        voteRecords: [vote('H-1', '2025-H10', { result: 'Fail', resultRaw: 'FAIL' })],
      },
      options
    );

    expect(result.tallies[0]).toMatchObject({ support: 0, oppose: 0, notCounted: 1, total: 1 });
    expect(result.rollCall.bills).toEqual([]);
    expect(result.rollCall.cells).toEqual({});
  });

  test('should fill cells of members without a counted vote with NotVoting', () => {
    const result = aggregate(
      {
        members: [member(2, 'John Doe'), member(1, 'Jane Smith')],
        bills: [bill(10, true)],
        voteRecords: [
          vote('H-2', '2025-H10', { cast: 'No', castRaw: 'No' }),
          vote('H-1', '2025-H10', { cast: 'Other', castRaw: 'Not Voting' }),
        ],
      },
      options
    );

    expect(result.rollCall.members.map((m) => m.id)).toEqual(['H-1', 'H-2']);
    expect(result.rollCall.cells).toEqual({ '2025-H10': { 'H-1': 'NotVoting', 'H-2': 'No' } });
    expect(result.tallies.map((t) => [t.memberId, t.support, t.oppose, t.notCounted])).toEqual([
      ['H-1', 0, 0, 1],
      ['H-2', 0, 1, 0],
    ]);
  });

  test('should ignore votes on unrelated bills', () => {
    const result = aggregate(
      { members: [member(1, 'Jane Smith')], bills: [bill(20, false)], voteRecords: [vote('H-1', '2025-H20')] },
      options
    );

    expect(result.tallies[0]).toMatchObject({ support: 0, oppose: 0, notCounted: 0, total: 0 });
    expect(result.rollCall.bills).toEqual([]);
  });

  test('should increment exactly one bucket per record on related bills', () => {
    const records: VoteRecord[] = [
      vote('H-1', '2025-H10'),
      vote('H-1', '2025-H10', { motion: '3rd Reading', cast: 'No', castRaw: 'No' }),
      vote('H-1', '2025-H11', { motion: 'Amendment 2' }),
      vote('H-1', '2025-H11', { result: 'Other', resultRaw: '' }),
      vote('H-1', '2025-H11', { cast: 'Other', castRaw: 'Exc. Absence' }),
      vote('H-1', '2025-H11', { motion: 'concur', result: 'Pass' }),
    ];

    const result = aggregate(
      { members: [member(1, 'Jane Smith')], bills: [bill(10, true), bill(11, true)], voteRecords: records },
      options
    );
    const tally = result.tallies[0];

    expect(tally).toMatchObject({ support: 2, oppose: 1, notCounted: 3, total: 6 });
    expect((tally?.support ?? 0) + (tally?.oppose ?? 0) + (tally?.notCounted ?? 0)).toBe(records.length);
  });

  test('should fill the cell from the latest counted vote', () => {
    const result = aggregate(
      {
        members: [member(1, 'Jane Smith')],
        bills: [bill(10, true)],
        voteRecords: [
          vote('H-1', '2025-H10', { motion: '3rd Reading', date: '3/14/2025 9:00:00 AM', cast: 'No', castRaw: 'No' }),
          vote('H-1', '2025-H10', { motion: '2nd Reading', date: '3/13/2025 4:00:00 PM' }),
        ],
      },
      options
    );

    expect(result.rollCall.cells['2025-H10']?.['H-1']).toBe('No');
  });

  test('should report records for unknown members or missing bills as anomalies', () => {
    const result = aggregate(
      {
        members: [member(1, 'Jane Smith')],
        bills: [bill(10, true)],
        voteRecords: [vote('H-1', '2025-H99'), vote('H-7', '2025-H10')],
      },
      options
    );

    expect(result.anomalies.map((anomaly) => anomaly.message)).toEqual([
      'Vote by H-1 on 2025-H99 excluded: bill page was not fetched or could not be parsed',
      'Vote by H-7 on 2025-H10 excluded: member is not in the member list',
    ]);
    expect(result.tallies[0]?.total).toBe(0);
  });

  test('should flag members whose history was unavailable', () => {
    const result = aggregate(
      {
        members: [member(1, 'Jane Smith'), member(2, 'John Doe')],
        bills: [],
        voteRecords: [],
        unavailableHistories: new Set(['H-2']),
      },
      options
    );

    expect(result.tallies.map((t) => t.historyAvailable)).toEqual([true, false]);
  });

  test('should compare motions case-insensitively with ordinals folded', () => {
    const countable = countableMotionSet(COUNTABLE_MOTIONS);

    expect(normalizeMotion('  Second   READING ')).toBe('2nd reading');
    expect(countVote({ motion: 'Second Reading', result: 'Pass', cast: 'Aye' }, countable)).toBe('support');
    expect(countVote({ motion: '2ND READING', result: 'Pass', cast: 'No' }, countable)).toBe('oppose');
    expect(countVote({ motion: '2nd Reading Amendment', result: 'Pass', cast: 'Aye' }, countable)).toBe(
      'not-counted'
    );
  });

  test('should parse vote history timestamps', () => {
    expect(parseVoteDate('3/12/2025 2:30:55 PM')).toBe(Date.UTC(2025, 2, 12, 14, 30, 55));
    expect(parseVoteDate('1/2/2025 12:05:00 AM')).toBe(Date.UTC(2025, 0, 2, 0, 5, 0));
    expect(parseVoteDate('not a date')).toBe(Number.NEGATIVE_INFINITY);
  });

  test('should list a member votes with counted votes first', () => {
    const details = listMemberVotes(
      {
        bills: [bill(10, true), bill(11, true), bill(20, false)],
        voteRecords: [
          vote('H-1', '2025-H11', { result: 'Fail', resultRaw: 'FAIL' }),
          vote('H-1', '2025-H20'),
          vote('H-1', '2025-H11', { cast: 'No', castRaw: 'No' }),
          vote('H-1', '2025-H10'),
          vote('H-2', '2025-H10'),
        ],
      },
      'H-1',
      options
    );

    expect(details.map((detail) => [detail.billId, detail.countedAs])).toEqual([
      ['2025-H10', 'support'],
      ['2025-H11', 'oppose'],
      ['2025-H11', 'not-counted'],
    ]);
    expect(details[0]).toMatchObject({
      billTitle: 'House Bill 10',
      billUrl: 'https://legislature.test/BillLookup/2025/H10',
      keywords: ['EMS'],
    });
  });
});
