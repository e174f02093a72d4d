import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { toError } from './errors';
import { snapshotSchema } from './schemas';
import type { Snapshot } from './types';

export type CacheState = 'empty' | 'fresh' | 'stale' | 'building';

export interface CacheOptions {
  maxAgeHours?: number; // Default: 6 hours
  serveStaleOnError?: boolean; // Serve the previous value, marked stale, when a rebuild fails
  now?: () => number;
}

export type CacheRead<T> =
  | { value: T; builtAt: number; stale: false }
  | { value: T; builtAt: number; stale: true; error: Error };

interface Stored<T> {
  value: T;
  builtAt: number;
}

interface CacheEntry<T> {
  stored: Stored<T> | null;
  building: Promise<Stored<T>> | null;
  lastError: Error | null;
  invalidated: boolean;
}

/**
 * Keyed time-to-live cache with at most one build in flight per key.
 * Readers that arrive while a key is building wait for that build.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly maxAgeMs: number;
  private readonly serveStaleOnError: boolean;
  private readonly now: () => number;

  constructor(options: CacheOptions = {}) {
    const { maxAgeHours = 6, serveStaleOnError = true, now = Date.now } = options;
    this.maxAgeMs = maxAgeHours * 60 * 60 * 1000;
    this.serveStaleOnError = serveStaleOnError;
    this.now = now;
  }

  getState(key: string): CacheState {
    const entry = this.entries.get(key);
    if (!entry) return 'empty';
    if (entry.building) return 'building';
    if (!entry.stored) return 'empty';
    return this.isFresh(entry) ? 'fresh' : 'stale';
  }

  /** Age in milliseconds of the stored value, or null when nothing is stored. */
  getAge(key: string): number | null {
    const stored = this.entries.get(key)?.stored;
    return stored ? this.now() - stored.builtAt : null;
  }

  async get(
    key: string,
    build: () => Promise<T>,
    options: { forceRefresh?: boolean } = {}
  ): Promise<CacheRead<T>> {
    const entry = this.entry(key);

    if (!entry.building && !options.forceRefresh && entry.stored && this.isFresh(entry)) {
      return { ...entry.stored, stale: false };
    }

    const building = entry.building ?? this.startBuild(entry, build);
    try {
      const stored = await building;
      return { ...stored, stale: false };
    } catch (error) {
      if (this.serveStaleOnError && entry.stored) {
        return { ...entry.stored, stale: true, error: toError(error) };
      }
      throw error;
    }
  }

  /** Seeds a value built elsewhere, e.g. loaded from disk. */
  prime(key: string, value: T, builtAt: number): void {
    const entry = this.entry(key);
    entry.stored = { value, builtAt };
    entry.lastError = null;
    entry.invalidated = false;
  }

  /** Marks the key stale so the next read rebuilds. */
  invalidate(key: string): void {
    const entry = this.entries.get(key);
    if (entry) {
      entry.invalidated = true;
    }
  }

  private entry(key: string): CacheEntry<T> {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { stored: null, building: null, lastError: null, invalidated: false };
      this.entries.set(key, entry);
    }
    return entry;
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return (
      entry.stored !== null &&
      entry.lastError === null &&
      !entry.invalidated &&
      this.now() - entry.stored.builtAt < this.maxAgeMs
    );
  }

  private startBuild(entry: CacheEntry<T>, build: () => Promise<T>): Promise<Stored<T>> {
    const building: Promise<Stored<T>> = this.runBuild(entry, build).finally(() => {
      if (entry.building === building) {
        entry.building = null;
      }
    });
    entry.building = building;
    return building;
  }

  private async runBuild(entry: CacheEntry<T>, build: () => Promise<T>): Promise<Stored<T>> {
    try {
      const value = await build();
      const stored = { value, builtAt: this.now() };
      entry.stored = stored;
      entry.lastError = null;
      entry.invalidated = false;
      return stored;
    } catch (error) {
      entry.lastError = toError(error);
      throw error;
    }
  }
}

/**
 * Get cache age for display
 */
export function formatCacheAge(ageMs: number): string {
  const ageHours = Math.floor(ageMs / (60 * 60 * 1000));
  const ageMinutes = Math.floor((ageMs % (60 * 60 * 1000)) / (60 * 1000));

  if (ageHours > 0) {
    return `${ageHours}h ${ageMinutes}m ago`;
  } else {
    return `${ageMinutes}m ago`;
  }
}

/**
 * Load a snapshot saved by a previous run. Missing or invalid files yield null.
 */
export function loadSnapshotFile(filePath: string): Snapshot | null {
  if (!existsSync(filePath)) {
    return null;
  }

  try {
    const content: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    const parsed = snapshotSchema.safeParse(content);
    if (parsed.success) {
      return parsed.data;
    }
    console.warn(`Ignoring cached snapshot ${filePath}: ${parsed.error.message}`);
  } catch (error) {
    console.warn(`Failed to parse cached snapshot from ${filePath}:`, error);
  }

  return null;
}

export function saveSnapshotFile(filePath: string, snapshot: Snapshot): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(snapshot, null, 2), 'utf-8');
}
