import { log } from './logger.js';
import { fetchAllPostings, type BoardFetcher } from './fetcher.js';
import { formatDigest, type Notifier } from './emailer.js';
import { SeenCache, DEFAULT_MAX_AGE_DAYS, type SeenStore } from './cache.js';
import type { FilterEngine } from './matcher.js';
import type { AtsType, CompanyEntry, Posting, RunSummary } from './types.js';

export interface PipelineDeps {
  companies: CompanyEntry[];
  filter: FilterEngine;
  store: SeenStore;
  /** Optional only for dry runs. */
  notifier?: Notifier;
  fetchers?: Record<AtsType, BoardFetcher>;
  now?: () => Date;
}

export interface PipelineOptions {
  subjectPrefix: string;
  maxAgeDays?: number;
  fetchTimeoutMs?: number;
  dryRun?: boolean;
}

function uniqueById(postings: readonly Posting[]): Posting[] {
  const seen = new Set<string>();
  return postings.filter((posting) => {
    if (seen.has(posting.id)) return false;
    seen.add(posting.id);
    return true;
  });
}

/**
 * One pass: fetch, filter, drop already-seen ids, send the digest, then record and prune.
 *
 * New ids are recorded only after the notifier reports success, so a failed send is
 * retried on the next run (at-least-once). A dry run sends nothing and leaves the store untouched.
 */
export async function runPipeline(deps: PipelineDeps, options: PipelineOptions): Promise<RunSummary> {
  const now = deps.now ?? (() => new Date());
  const maxAgeDays = options.maxAgeDays ?? DEFAULT_MAX_AGE_DAYS;
  const notifier = deps.notifier;
  if (!notifier && !options.dryRun) {
    throw new Error('A notifier is required unless dryRun is set');
  }

  const { postings, failures } = await fetchAllPostings(deps.companies, {
    fetchers: deps.fetchers,
    timeoutMs: options.fetchTimeoutMs,
  });

  const matched = uniqueById(deps.filter.filter(postings));
  const cache = await SeenCache.open(deps.store);
  const fresh = matched.filter((posting) => !cache.has(posting.id));
  log.info(`Dedup: ${fresh.length} new, ${matched.length - fresh.length} already seen`);

  let emailSent = false;
  if (fresh.length === 0) {
    log.info('Nothing new — no email sent');
  } else if (options.dryRun || !notifier) {
    const digest = formatDigest(fresh, options.subjectPrefix);
    log.info(`Dry-run: would send "${digest.subject}"\n${digest.text}`);
  } else {
    emailSent = await notifier.send(formatDigest(fresh, options.subjectPrefix));
    if (emailSent) {
      const seenAt = now();
      for (const posting of fresh) {
        cache.markSeen(posting.id, seenAt);
      }
    } else {
      log.warn(`Email not delivered — ${fresh.length} postings left unmarked for the next run`);
    }
  }

  const pruned = cache.prune(now(), maxAgeDays);
  if (pruned > 0) {
    log.info(`Pruned ${pruned} cache entries older than ${maxAgeDays} days`);
  }

  if (options.dryRun) {
    log.info('Dry-run: seen cache not written');
  } else {
    await cache.persist(deps.store);
  }

  return {
    postingsFetched: postings.length,
    postingsMatched: matched.length,
    postingsNew: fresh.length,
    emailSent,
    cacheSize: cache.size,
    cachePruned: pruned,
    failures,
  };
}
