declare namespace NodeJS {
  interface ProcessEnv {
    LEGISLATURE_BASE_URL?: string;
    LEGISLATURE_SESSION?: string;
    LEGISLATURE_CHAMBER?: string;
    CACHE_TTL_HOURS?: string;
    MAX_CONCURRENT_FETCHES?: string;
    REQUEST_DELAY?: string;
    FETCH_TIMEOUT?: string;
    FIREFIGHTER_KEYWORDS?: string;
    COUNTABLE_MOTIONS?: string;
  }
}
