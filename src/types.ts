export type Chamber = 'H' | 'S';
export type PartyCode = 'R' | 'D' | 'U';
export type VoteCast = 'Aye' | 'No' | 'Other';
export type VoteResult = 'Pass' | 'Fail' | 'Other';
export type RollCallVote = 'Aye' | 'No' | 'NotVoting';
export type CountedAs = 'support' | 'oppose' | 'not-counted';
export type PageType = 'member-list' | 'contact-info' | 'vote-history' | 'bill-lookup';

export interface Member {
  id: string;
  chamber: Chamber;
  seat: number;
  name: string;
  party: PartyCode;
  partyIcon: string;
  district: string;
  counties: string[];
  phone: string;
  assistant: string;
  email: string;
  profileUrl: string;
  voteHistoryUrl: string;
}

export interface ClassificationResult {
  related: boolean;
  via: 'keyword' | 'title-heuristic' | 'unclassified' | 'none';
  matched: string[];
  reason: string;
}

export interface Bill {
  id: string;
  session: string;
  chamber: Chamber;
  number: number;
  url: string;
  title: string;
  keywords: string[];
  rawKeywords: string | null;
  classification: ClassificationResult;
}

export interface VoteRecord {
  memberId: string;
  billId: string;
  rollCall: string;
  date: string;
  motion: string;
  cast: VoteCast;
  castRaw: string;
  result: VoteResult;
  resultRaw: string;
}

export interface Tally {
  memberId: string;
  support: number;
  oppose: number;
  notCounted: number;
  total: number;
  historyAvailable: boolean;
}

export interface RollCallMatrix {
  bills: { id: string; title: string }[];
  members: { id: string; name: string; party: PartyCode }[];
  cells: Record<string, Record<string, RollCallVote>>;
}

export interface MemberVoteDetail {
  billId: string;
  billTitle: string;
  billUrl: string;
  keywords: string[];
  motion: string;
  date: string;
  cast: VoteCast;
  result: VoteResult;
  countedAs: CountedAs;
}

export interface BuildIssue {
  kind: 'fetch' | 'parse' | 'classification' | 'aggregation' | 'unknown';
  itemType: 'member' | 'vote-history' | 'bill' | 'vote-record';
  itemId: string;
  message: string;
}

export interface BuildReport {
  startedAt: string;
  finishedAt: string;
  requestCount: number;
  skipped: BuildIssue[];
  anomalies: BuildIssue[];
}

export interface Snapshot {
  builtAt: string;
  chamber: Chamber;
  session: string;
  members: Member[];
  bills: Bill[];
  voteRecords: VoteRecord[];
  tallies: Tally[];
  rollCall: RollCallMatrix;
  report: BuildReport;
}

export type SnapshotResult =
  | { snapshot: Snapshot; stale: false }
  | { snapshot: Snapshot; stale: true; error: Error };

/** A value read from a snapshot, carrying that snapshot's staleness. */
export type QueryResult<T> =
  | { value: T; stale: false }
  | { value: T; stale: true; error: Error };
