import { z } from 'zod';
import type { Snapshot } from './types';

const chamberSchema = z.enum(['H', 'S']);
const partySchema = z.enum(['R', 'D', 'U']);

const memberSchema = z.object({
  id: z.string().min(1),
  chamber: chamberSchema,
  seat: z.number().int().nonnegative(),
  name: z.string().min(1),
  party: partySchema,
  partyIcon: z.string(),
  district: z.string(),
  counties: z.array(z.string()),
  phone: z.string(),
  assistant: z.string(),
  email: z.string(),
  profileUrl: z.string(),
  voteHistoryUrl: z.string(),
});

const classificationSchema = z.object({
  related: z.boolean(),
  via: z.enum(['keyword', 'title-heuristic', 'unclassified', 'none']),
  matched: z.array(z.string()),
  reason: z.string(),
});

const billSchema = z.object({
  id: z.string().min(1),
  session: z.string().min(1),
  chamber: chamberSchema,
  number: z.number().int().nonnegative(),
  url: z.string(),
  title: z.string(),
  keywords: z.array(z.string()),
  rawKeywords: z.string().nullable(),
  classification: classificationSchema,
});

const voteRecordSchema = z.object({
  memberId: z.string(),
  billId: z.string(),
  rollCall: z.string(),
  date: z.string(),
  motion: z.string(),
  cast: z.enum(['Aye', 'No', 'Other']),
  castRaw: z.string(),
  result: z.enum(['Pass', 'Fail', 'Other']),
  resultRaw: z.string(),
});

const tallySchema = z.object({
  memberId: z.string(),
  support: z.number().int().nonnegative(),
  oppose: z.number().int().nonnegative(),
  notCounted: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  historyAvailable: z.boolean(),
});

const rollCallSchema = z.object({
  bills: z.array(z.object({ id: z.string(), title: z.string() })),
  members: z.array(z.object({ id: z.string(), name: z.string(), party: partySchema })),
  cells: z.record(z.string(), z.record(z.string(), z.enum(['Aye', 'No', 'NotVoting']))),
});

const buildIssueSchema = z.object({
  kind: z.enum(['fetch', 'parse', 'classification', 'aggregation', 'unknown']),
  itemType: z.enum(['member', 'vote-history', 'bill', 'vote-record']),
  itemId: z.string(),
  message: z.string(),
});

/** Validates snapshots persisted to disk before they are served again. */
export const snapshotSchema: z.ZodType<Snapshot> = z.object({
  builtAt: z.string().datetime(),
  chamber: chamberSchema,
  session: z.string().min(1),
  members: z.array(memberSchema).min(1),
  bills: z.array(billSchema),
  voteRecords: z.array(voteRecordSchema),
  tallies: z.array(tallySchema),
  rollCall: rollCallSchema,
  report: z.object({
    startedAt: z.string(),
    finishedAt: z.string(),
    requestCount: z.number().int().nonnegative(),
    skipped: z.array(buildIssueSchema),
    anomalies: z.array(buildIssueSchema),
  }),
});
