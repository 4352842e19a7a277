import { z } from 'zod';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { log } from './logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_MAX_AGE_DAYS = 30;

/** Posting id -> ISO timestamp of the first run that emitted it. */
export type SeenEntries = Record<string, string>;

export interface SeenStore {
  load(): Promise<SeenEntries>;
  save(entries: SeenEntries): Promise<void>;
}

const SeenFileSchema = z.record(
  z.string(),
  z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid timestamp'),
);

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileSeenStore implements SeenStore {
  constructor(private readonly path: string) {}

  async load(): Promise<SeenEntries> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err: unknown) {
      if (isMissingFile(err)) return {};
      throw err;
    }
    return SeenFileSchema.parse(JSON.parse(raw));
  }

  async save(entries: SeenEntries): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    await writeFile(tmpPath, JSON.stringify(entries, null, 2));
    await rename(tmpPath, this.path);
  }
}

export class MemorySeenStore implements SeenStore {
  constructor(private entries: SeenEntries = {}) {}

  async load(): Promise<SeenEntries> {
    return { ...this.entries };
  }

  async save(entries: SeenEntries): Promise<void> {
    this.entries = { ...entries };
  }

  snapshot(): SeenEntries {
    return { ...this.entries };
  }
}

export class SeenCache {
  private readonly seen: Map<string, number>;

  private constructor(entries: SeenEntries) {
    this.seen = new Map(Object.entries(entries).map(([id, at]) => [id, Date.parse(at)]));
  }

  static empty(): SeenCache {
    return new SeenCache({});
  }

  /** An unreadable or corrupt store opens as an empty cache. */
  static async open(store: SeenStore): Promise<SeenCache> {
    try {
      const cache = new SeenCache(await store.load());
      log.info(`Seen cache loaded: ${cache.size} postings`);
      return cache;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Seen cache unreadable, starting empty: ${message}`);
      return SeenCache.empty();
    }
  }

  get size(): number {
    return this.seen.size;
  }

  has(id: string): boolean {
    return this.seen.has(id);
  }

  markSeen(id: string, now: Date): void {
    if (!this.seen.has(id)) {
      this.seen.set(id, now.getTime());
    }
  }

  prune(now: Date, maxAgeDays: number = DEFAULT_MAX_AGE_DAYS): number {
    const cutoff = now.getTime() - maxAgeDays * DAY_MS;
    let removed = 0;
    for (const [id, firstSeen] of this.seen) {
      if (firstSeen < cutoff) {
        this.seen.delete(id);
        removed++;
      }
    }
    return removed;
  }

  entries(): SeenEntries {
    const out: SeenEntries = {};
    for (const [id, firstSeen] of this.seen) {
      out[id] = new Date(firstSeen).toISOString();
    }
    return out;
  }

  async persist(store: SeenStore): Promise<void> {
    await store.save(this.entries());
  }
}
