import { listMemberVotes } from './aggregator';
import { formatCacheAge, TtlCache } from './cache';
import { loadConfig, type TrackerConfig } from './config';
import { CACHE_CONFIG } from './constants';
import { type HttpTransport, PageFetcher, PlaywrightTransport } from './fetcher';
import { SnapshotBuilder } from './pipeline';
import type {
  ClassificationResult,
  MemberVoteDetail,
  QueryResult,
  RollCallMatrix,
  Snapshot,
  SnapshotResult,
  Tally,
} from './types';

export interface TrackerOptions {
  transport?: HttpTransport;
  now?: () => number;
}

/**
 * Query interface over the firefighter vote snapshot. Snapshots are built on
 * first use and rebuilt once older than the configured TTL.
 */
export class FirefighterVoteTracker {
  readonly config: TrackerConfig;
  private readonly fetcher: PageFetcher;
  private readonly builder: SnapshotBuilder;
  private readonly cache: TtlCache<Snapshot>;

  constructor(config: TrackerConfig = loadConfig(), options: TrackerOptions = {}) {
    const now = options.now ?? Date.now;
    this.config = config;
    this.fetcher = new PageFetcher(options.transport ?? new PlaywrightTransport(), {
      timeoutMs: config.fetchTimeoutMs,
      userAgent: config.userAgent,
    });
    this.builder = new SnapshotBuilder(config, this.fetcher, now);
    this.cache = new TtlCache<Snapshot>({
      maxAgeHours: config.cacheTtlHours,
      serveStaleOnError: config.serveStaleOnError,
      now,
    });
  }

  /**
   * Returns the current snapshot, rebuilding it when stale, absent or when
   * `forceRefresh` is set. A failed rebuild serves the previous snapshot
   * marked stale; without a previous snapshot the error is thrown.
   */
  async getSnapshot(options: { forceRefresh?: boolean } = {}): Promise<SnapshotResult> {
    const read = await this.cache.get(CACHE_CONFIG.SNAPSHOT_KEY, () => this.builder.build(), {
      forceRefresh: options.forceRefresh ?? false,
    });
    return read.stale
      ? { snapshot: read.value, stale: true, error: read.error }
      : { snapshot: read.value, stale: false };
  }

  /**
   * Query methods read the current snapshot, or `source` when the caller
   * already holds one, and return a copy marked with that snapshot's
   * staleness.
   */
  async getMemberTally(
    memberId: string,
    source?: SnapshotResult
  ): Promise<QueryResult<Tally | null>> {
    return this.query((snapshot) => findMemberTally(snapshot, memberId), source);
  }

  async getRollCallMatrix(source?: SnapshotResult): Promise<QueryResult<RollCallMatrix>> {
    return this.query((snapshot) => snapshot.rollCall, source);
  }

  async getBillClassification(
    billId: string,
    source?: SnapshotResult
  ): Promise<QueryResult<ClassificationResult | null>> {
    return this.query((snapshot) => findBillClassification(snapshot, billId), source);
  }

  /** A member's firefighter-related votes and how each one was counted. */
  async getMemberVotes(
    memberId: string,
    source?: SnapshotResult
  ): Promise<QueryResult<MemberVoteDetail[]>> {
    return this.query(
      (snapshot) =>
        listMemberVotes(snapshot, memberId, { countableMotions: this.config.countableMotions }),
      source
    );
  }

  /** Seeds the cache with a snapshot built earlier, e.g. by a previous run. */
  primeSnapshot(snapshot: Snapshot): void {
    const builtAt = Date.parse(snapshot.builtAt);
    if (Number.isNaN(builtAt)) {
      console.warn(`Ignoring snapshot with invalid build time: ${snapshot.builtAt}`);
      return;
    }
    this.cache.prime(CACHE_CONFIG.SNAPSHOT_KEY, snapshot, builtAt);
  }

  /** Forces the next read to rebuild. */
  invalidate(): void {
    this.cache.invalidate(CACHE_CONFIG.SNAPSHOT_KEY);
  }

  getCacheState() {
    return this.cache.getState(CACHE_CONFIG.SNAPSHOT_KEY);
  }

  getCacheInfo(): string | null {
    const age = this.cache.getAge(CACHE_CONFIG.SNAPSHOT_KEY);
    return age === null ? null : formatCacheAge(age);
  }

  private async query<T>(
    select: (snapshot: Snapshot) => T,
    source?: SnapshotResult
  ): Promise<QueryResult<T>> {
    const result = source ?? (await this.getSnapshot());
    // Callers get their own copy; the cached snapshot is never handed out
    const value = structuredClone(select(result.snapshot));
    return result.stale ? { value, stale: true, error: result.error } : { value, stale: false };
  }

  async close(): Promise<void> {
    await this.fetcher.close();
  }
}

export function findMemberTally(snapshot: Snapshot, memberId: string): Tally | null {
  return snapshot.tallies.find((tally) => tally.memberId === memberId) ?? null;
}

export function findBillClassification(
  snapshot: Snapshot,
  billId: string
): ClassificationResult | null {
  return snapshot.bills.find((bill) => bill.id === billId)?.classification ?? null;
}
