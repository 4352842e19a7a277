import { log } from './logger.js';
import type { Config, UsState } from './config.js';
import type { Posting } from './types.js';

export interface LocationMatcher {
  test(location: string): boolean;
}

export interface FilterConfig {
  readonly positiveTitleTerms: ReadonlySet<string>;
  readonly negativeTitleTerms: ReadonlySet<string>;
  readonly usLocationPattern: LocationMatcher;
}

export type FilterVerdict =
  | { keep: true }
  | { keep: false; reason: 'negative-term'; term: string }
  | { keep: false; reason: 'no-positive-term' }
  | { keep: false; reason: 'non-us-location' };

const US_MARKERS = [String.raw`\bunited states\b`, String.raw`\busa\b`, String.raw`\bu\.s\.`];

export interface LocationTables {
  states: UsState[];
  nonUsCities: string[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid location pattern "${source}": ${message}`);
  }
}

/**
 * Matches locations inside the US or remote roles open to the US.
 *
 * "United States", "USA" and "U.S." match in any case, "US" only in upper case. State names
 * match in any case. Two-letter state codes only count in upper case after a comma, as in
 * "Austin, TX", and not when they follow another code ("Toronto, ON, CA"), where they are a
 * country code.
 *
 * A location whose first part is a known non-US city ("Pune, IN", "Tbilisi, Georgia") is
 * rejected unless it also carries one of the US markers.
 */
export function createUsLocationMatcher(tables: LocationTables, extraPatterns: string[] = []): LocationMatcher {
  const names = tables.states.map((s) => escapeRegExp(s.name.toLowerCase())).join('|');
  const abbreviations = tables.states.map((s) => s.abbreviation).join('|');
  const nonUsCities = new Set(tables.nonUsCities.map((c) => c.toLowerCase()));

  const marker = new RegExp(`(?:${US_MARKERS.join('|')})`, 'i');
  const usCode = /\bUS\b/;
  const stateName = new RegExp(`\\b(?:${names})\\b`, 'i');
  const stateCode = new RegExp(`(?<!\\b[A-Z]{2}),\\s*(?:${abbreviations})\\b`);
  const extras = extraPatterns.map(compilePattern);

  return {
    test(location: string): boolean {
      if (marker.test(location) || usCode.test(location)) return true;
      if (extras.some((re) => re.test(location))) return true;

      const city = location.split(',')[0].trim().toLowerCase();
      if (nonUsCities.has(city)) return false;

      return stateName.test(location) || stateCode.test(location);
    },
  };
}

function normalizeTerms(terms: readonly string[]): ReadonlySet<string> {
  return new Set(terms.map((t) => t.trim().toLowerCase()).filter((t) => t.length > 0));
}

export function createFilterConfig(filters: Config['filters'], tables: LocationTables): FilterConfig {
  return Object.freeze({
    positiveTitleTerms: normalizeTerms(filters.positiveTitleTerms),
    negativeTitleTerms: normalizeTerms(filters.negativeTitleTerms),
    usLocationPattern: createUsLocationMatcher(tables, filters.extraLocationPatterns),
  });
}

export class FilterEngine {
  constructor(private readonly config: FilterConfig) {}

  evaluate(posting: Posting): FilterVerdict {
    const title = posting.title.toLowerCase();

    for (const term of this.config.negativeTitleTerms) {
      if (title.includes(term)) {
        return { keep: false, reason: 'negative-term', term };
      }
    }

    let hasPositive = false;
    for (const term of this.config.positiveTitleTerms) {
      if (title.includes(term)) {
        hasPositive = true;
        break;
      }
    }
    if (!hasPositive) {
      return { keep: false, reason: 'no-positive-term' };
    }

    if (!this.config.usLocationPattern.test(posting.location)) {
      return { keep: false, reason: 'non-us-location' };
    }

    return { keep: true };
  }

  matches(posting: Posting): boolean {
    return this.evaluate(posting).keep;
  }

  filter(postings: readonly Posting[]): Posting[] {
    const kept: Posting[] = [];
    const rejected: Record<string, number> = {};

    for (const posting of postings) {
      const verdict = this.evaluate(posting);
      if (verdict.keep) {
        kept.push(posting);
        continue;
      }
      rejected[verdict.reason] = (rejected[verdict.reason] ?? 0) + 1;
      if (verdict.reason === 'non-us-location') {
        log.info(`Location filter: excluded "${posting.title}" at ${posting.company} (${posting.location || 'no location'})`);
      }
    }

    const summary = Object.entries(rejected)
      .map(([reason, count]) => `${reason}=${count}`)
      .join(', ');
    log.info(`Filtering: ${kept.length} kept, ${postings.length - kept.length} rejected${summary ? ` (${summary})` : ''}`);
    return kept;
  }
}
