import { z } from 'zod';
import {
  CACHE_CONFIG,
  CONCURRENCY_CONFIG,
  COUNTABLE_MOTIONS,
  FIREFIGHTER_KEYWORDS,
  LEGISLATURE_CONFIG,
  TITLE_HEURISTIC_TERMS,
} from './constants';
import type { Chamber } from './types';

const urlTemplatesSchema = z.object({
  memberList: z.string().min(1),
  contactInfo: z.string().min(1),
  voteHistory: z.string().min(1),
  billLookup: z.string().min(1),
});

export const trackerConfigSchema = z.object({
  baseUrl: z.string().url(),
  chamber: z.enum(['H', 'S']),
  session: z.string().min(1),
  urls: urlTemplatesSchema,
  keywords: z.array(z.string().trim().min(1)).min(1),
  countableMotions: z.array(z.string().trim().min(1)),
  titleTerms: z.array(z.string().trim().min(1)),
  cacheTtlHours: z.number().positive(),
  maxConcurrentFetches: z.number().int().min(1),
  requestDelayMs: z.number().int().min(0),
  fetchTimeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
  serveStaleOnError: z.boolean(),
});

export type TrackerConfig = z.infer<typeof trackerConfigSchema>;
export type UrlTemplates = TrackerConfig['urls'];
export type TrackerConfigOverrides = Partial<Omit<TrackerConfig, 'urls'>> & {
  urls?: Partial<UrlTemplates>;
};

function parseNumberEnv(value: string | undefined): number | undefined {
  if (!value?.trim()) return undefined;
  return Number(value);
}

// Semicolon separated, the same way bill pages publish their Keywords
function parseListEnv(value: string | undefined): string[] | undefined {
  const items = (value ?? '')
    .split(';')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function definedEntries(values: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Builds the tracker configuration from defaults, environment variables and
 * explicit overrides (highest precedence). Throws a ZodError on invalid values.
 */
export function loadConfig(
  overrides: TrackerConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): TrackerConfig {
  const { urls, ...rest } = overrides;
  const templates = LEGISLATURE_CONFIG.URL_TEMPLATES;

  return trackerConfigSchema.parse({
    baseUrl: env.LEGISLATURE_BASE_URL?.trim() || LEGISLATURE_CONFIG.BASE_URL,
    chamber: env.LEGISLATURE_CHAMBER?.trim().toUpperCase() || LEGISLATURE_CONFIG.CHAMBER,
    session: env.LEGISLATURE_SESSION?.trim() || LEGISLATURE_CONFIG.SESSION,
    urls: {
      memberList: templates.MEMBER_LIST,
      contactInfo: templates.CONTACT_INFO,
      voteHistory: templates.VOTE_HISTORY,
      billLookup: templates.BILL_LOOKUP,
      ...definedEntries(urls ?? {}),
    },
    keywords: parseListEnv(env.FIREFIGHTER_KEYWORDS) ?? [...FIREFIGHTER_KEYWORDS],
    countableMotions: parseListEnv(env.COUNTABLE_MOTIONS) ?? [...COUNTABLE_MOTIONS],
    titleTerms: [...TITLE_HEURISTIC_TERMS],
    cacheTtlHours: parseNumberEnv(env.CACHE_TTL_HOURS) ?? CACHE_CONFIG.MAX_AGE_HOURS,
    maxConcurrentFetches:
      parseNumberEnv(env.MAX_CONCURRENT_FETCHES) ?? CONCURRENCY_CONFIG.MAX_CONCURRENT_FETCHES,
    requestDelayMs: parseNumberEnv(env.REQUEST_DELAY) ?? CONCURRENCY_CONFIG.REQUEST_DELAY,
    fetchTimeoutMs: parseNumberEnv(env.FETCH_TIMEOUT) ?? LEGISLATURE_CONFIG.TIMEOUTS.FETCH,
    userAgent: LEGISLATURE_CONFIG.USER_AGENT,
    serveStaleOnError: true,
    ...definedEntries(rest),
  });
}

/**
 * Fills `{name}` placeholders. `base` is inserted as-is, other values are
 * URI-encoded.
 */
export function expandUrl(template: string, params: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_placeholder, key: string) => {
    const value = params[key];
    if (value === undefined) {
      throw new Error(`Missing value for {${key}} in URL template ${template}`);
    }
    return key === 'base' ? value.replace(/\/+$/, '') : encodeURIComponent(value);
  });
}

function templateParams(config: TrackerConfig, chamber: Chamber = config.chamber) {
  return { base: config.baseUrl, chamber, session: config.session };
}

export function memberListUrl(config: TrackerConfig): string {
  return expandUrl(config.urls.memberList, templateParams(config));
}

export function contactInfoUrl(config: TrackerConfig): string {
  return expandUrl(config.urls.contactInfo, templateParams(config));
}

export function voteHistoryUrl(config: TrackerConfig, seat: number): string {
  return expandUrl(config.urls.voteHistory, { ...templateParams(config), member: String(seat) });
}

export function billLookupUrl(
  config: TrackerConfig,
  bill: { session: string; chamber: Chamber; number: number }
): string {
  return expandUrl(config.urls.billLookup, {
    ...templateParams(config, bill.chamber),
    session: bill.session,
    bill: `${bill.chamber}${bill.number}`,
  });
}
