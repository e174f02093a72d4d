import { expect, test } from '@playwright/test';
import {
  compareBillIds,
  compareMemberIds,
  formatBillId,
  formatMemberId,
  parseBillId,
  parseMemberId,
} from '../src/ids';

test.describe('Identifiers', () => {
  test('should format and parse member ids', () => {
    expect(formatMemberId('H', 101)).toBe('H-101');
    expect(parseMemberId('S-7')).toEqual({ chamber: 'S', seat: 7 });
    expect(parseMemberId('101')).toBeNull();
  });

  test('should format and parse bill ids', () => {
    expect(formatBillId('2025', 'H', 123)).toBe('2025-H123');
    expect(parseBillId('2025E1-S4')).toEqual({ session: '2025E1', chamber: 'S', number: 4 });
    expect(parseBillId('H123')).toBeNull();
  });

  test('should order members by chamber then seat', () => {
    expect(['S-2', 'H-20', 'H-3'].sort(compareMemberIds)).toEqual(['H-3', 'H-20', 'S-2']);
  });

  test('should order bills by session, chamber and number', () => {
    expect(['2025-S50', '2025-H200', '2023-H9', '2025-H123'].sort(compareBillIds)).toEqual([
      '2023-H9',
      '2025-H123',
      '2025-H200',
      '2025-S50',
    ]);
  });
});
