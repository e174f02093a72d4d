import type { PartyCode } from './types';

// Configuration constants for scraping
export const LEGISLATURE_CONFIG = {
  BASE_URL: 'https://www.ncleg.gov',
  SESSION: '2025',
  CHAMBER: 'H',
  // Placeholders: {base} {chamber} {member} {session} {bill}
  URL_TEMPLATES: {
    MEMBER_LIST: '{base}/Members/MemberList/{chamber}',
    CONTACT_INFO: '{base}/Members/ContactInfo/{chamber}',
    VOTE_HISTORY: '{base}/Members/Votes/{chamber}/{member}',
    BILL_LOOKUP: '{base}/BillLookup/{session}/{bill}',
  },
  USER_AGENT: 'firefighter-vote-tracker/0.1 (read-only legislative vote aggregation)',
  TIMEOUTS: {
    FETCH: 30000,
  },
} as const;

export const CACHE_CONFIG = {
  MAX_AGE_HOURS: 6,
  SNAPSHOT_KEY: 'snapshot',
  SNAPSHOT_FILENAME: 'firefighter-snapshot.json',
} as const;

export const CONCURRENCY_CONFIG = {
  MAX_CONCURRENT_FETCHES: 4,
  REQUEST_DELAY: 250,
} as const;

// Matched against the Keywords field on bill pages (case-insensitive)
export const FIREFIGHTER_KEYWORDS = [
  'FIREFIGHTERS & FIREFIGHTING',
  'EMERGENCY MEDICAL SERVICES',
  'EMS',
  'RESCUE SQUADS',
  'FIREMENS PENSION FUND',
  'PENSION & RETIREMENT FUNDS',
  '9-1-1',
  'EMERGENCY SERVICES',
  "WORKERS' COMPENSATION",
  'CANCER',
] as const;

export const COUNTABLE_MOTIONS = ['2nd Reading', '3rd Reading', 'Concur', 'For Adoption'] as const;

export const TITLE_HEURISTIC_TERMS = [
  'firefighter',
  'fire fighter',
  'firemen',
  'EMS',
  'rescue',
  '9-1-1',
  '911',
  'pension',
] as const;

export const PARTY_ICONS: Record<PartyCode, string> = {
  R: '🐘 R',
  D: '🫏 D',
  U: 'U',
};
