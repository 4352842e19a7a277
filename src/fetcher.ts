import { z } from 'zod';
import { log } from './logger.js';
import type { AtsType, CompanyEntry, FetchFailure, Posting } from './types.js';

const GREENHOUSE_BASE_URL = 'https://boards-api.greenhouse.io/v1/boards';
const LEVER_BASE_URL = 'https://api.lever.co/v0/postings';
const SMARTRECRUITERS_BASE_URL = 'https://api.smartrecruiters.com/v1/companies';
const SMARTRECRUITERS_JOBS_URL = 'https://jobs.smartrecruiters.com';
const SMARTRECRUITERS_PAGE_SIZE = 100;
const SMARTRECRUITERS_MAX_PAGES = 20;
const DEFAULT_TIMEOUT_MS = 30_000;

export type BoardFetcher = (board: string, company: string, timeoutMs: number) => Promise<Posting[]>;

export function postingId(type: AtsType, board: string, vendorId: string | number): string {
  return `${type}:${board}:${vendorId}`;
}

async function fetchJson(url: string, label: string, timeoutMs: number): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { 'User-Agent': 'ats-job-alerts/1.0', Accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`${label} request failed: ${message} (${url})`);
  }

  if (!response.ok) {
    throw new Error(`${label} returned ${response.status} (${url})`);
  }

  try {
    return await response.json();
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`${label} returned invalid JSON: ${message}`);
  }
}

function normalizeItems<S extends z.ZodTypeAny>(
  items: unknown[],
  schema: S,
  label: string,
  normalize: (item: z.infer<S>) => Posting,
): Posting[] {
  const postings: Posting[] = [];
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) {
      postings.push(normalize(result.data));
    } else {
      log.warn(`Skipping invalid ${label} posting: ${JSON.stringify(result.error.issues[0])}`);
    }
  }
  if (postings.length < items.length) {
    log.info(`${label}: ${postings.length} valid postings (${items.length - postings.length} skipped)`);
  }
  return postings;
}

const GreenhouseResponseSchema = z.object({
  jobs: z.array(z.unknown()),
});

const GreenhouseJobSchema = z.object({
  id: z.union([z.number(), z.string()]),
  title: z.string().min(1),
  location: z.object({ name: z.string().optional().default('') }).optional(),
  absolute_url: z.string().url(),
});

type GreenhouseJob = z.infer<typeof GreenhouseJobSchema>;

export const fetchGreenhousePostings: BoardFetcher = async (board, company, timeoutMs) => {
  const label = `Greenhouse [${board}]`;
  const data = GreenhouseResponseSchema.parse(
    await fetchJson(`${GREENHOUSE_BASE_URL}/${encodeURIComponent(board)}/jobs`, label, timeoutMs),
  );

  return normalizeItems(data.jobs, GreenhouseJobSchema, label, (job: GreenhouseJob) => ({
    id: postingId('greenhouse', board, job.id),
    title: job.title.trim(),
    location: job.location?.name.trim() ?? '',
    url: job.absolute_url,
    company,
  }));
};

const LeverPostingSchema = z.object({
  id: z.string().min(1),
  text: z.string().min(1),
  categories: z
    .object({ location: z.string().optional().default('') })
    .optional()
    .default({}),
  hostedUrl: z.string().url(),
});

type LeverPosting = z.infer<typeof LeverPostingSchema>;

export const fetchLeverPostings: BoardFetcher = async (board, company, timeoutMs) => {
  const label = `Lever [${board}]`;
  const data = z
    .array(z.unknown())
    .parse(await fetchJson(`${LEVER_BASE_URL}/${encodeURIComponent(board)}?mode=json`, label, timeoutMs));

  return normalizeItems(data, LeverPostingSchema, label, (posting: LeverPosting) => ({
    id: postingId('lever', board, posting.id),
    title: posting.text.trim(),
    location: posting.categories.location.trim(),
    url: posting.hostedUrl,
    company,
  }));
};

const SmartRecruitersResponseSchema = z.object({
  totalFound: z.number().int().nonnegative().optional(),
  content: z.array(z.unknown()),
});

const SmartRecruitersPostingSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  location: z
    .object({
      fullLocation: z.string().optional(),
      city: z.string().optional(),
      region: z.string().optional(),
      country: z.string().optional(),
      remote: z.boolean().optional().default(false),
    })
    .optional(),
});

type SmartRecruitersPosting = z.infer<typeof SmartRecruitersPostingSchema>;

const regionNames = new Intl.DisplayNames(['en'], { type: 'region' });

/** ISO 3166 alpha-2 code to its English name ("ca" -> "Canada"); anything else is kept as given. */
export function countryName(code: string): string {
  const trimmed = code.trim();
  if (!/^[a-z]{2}$/i.test(trimmed)) return trimmed;
  return regionNames.of(trimmed.toUpperCase()) ?? trimmed;
}

export function formatSmartRecruitersLocation(location: SmartRecruitersPosting['location']): string {
  if (!location) return '';

  const base =
    location.fullLocation?.trim() ||
    [location.city, location.region, location.country ? countryName(location.country) : undefined]
      .filter((part): part is string => Boolean(part))
      .join(', ');

  if (location.remote && !/remote/i.test(base)) {
    return base ? `Remote - ${base}` : 'Remote';
  }
  return base;
}

export const fetchSmartRecruitersPostings: BoardFetcher = async (board, company, timeoutMs) => {
  const label = `SmartRecruiters [${board}]`;
  const items: unknown[] = [];
  let totalFound: number | undefined;

  for (let page = 0; page < SMARTRECRUITERS_MAX_PAGES; page++) {
    const offset = items.length;
    const url = `${SMARTRECRUITERS_BASE_URL}/${encodeURIComponent(board)}/postings?limit=${SMARTRECRUITERS_PAGE_SIZE}&offset=${offset}`;
    const data = SmartRecruitersResponseSchema.parse(await fetchJson(url, label, timeoutMs));
    items.push(...data.content);
    totalFound = data.totalFound;

    const exhausted =
      data.content.length < SMARTRECRUITERS_PAGE_SIZE || (totalFound !== undefined && items.length >= totalFound);
    if (exhausted) break;
  }

  if (totalFound !== undefined && items.length < totalFound) {
    log.warn(`${label}: stopped after ${items.length} of ${totalFound} postings`);
  }

  return normalizeItems(items, SmartRecruitersPostingSchema, label, (posting: SmartRecruitersPosting) => ({
    id: postingId('smartrecruiters', board, posting.id),
    title: posting.name.trim(),
    location: formatSmartRecruitersLocation(posting.location),
    url: `${SMARTRECRUITERS_JOBS_URL}/${encodeURIComponent(board)}/${posting.id}`,
    company,
  }));
};

export const defaultFetchers: Record<AtsType, BoardFetcher> = {
  greenhouse: fetchGreenhousePostings,
  lever: fetchLeverPostings,
  smartrecruiters: fetchSmartRecruitersPostings,
};

export interface FetchAllResult {
  postings: Posting[];
  failures: FetchFailure[];
}

export interface FetchAllOptions {
  fetchers?: Record<AtsType, BoardFetcher>;
  timeoutMs?: number;
}

export async function fetchAllPostings(
  companies: CompanyEntry[],
  options: FetchAllOptions = {},
): Promise<FetchAllResult> {
  const fetchers = options.fetchers ?? defaultFetchers;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const failures: FetchFailure[] = [];

  log.info(`Fetching postings for ${companies.length} companies...`);

  const results = await Promise.all(
    companies.map(async (company): Promise<Posting[]> => {
      try {
        const postings = await fetchers[company.type](company.board, company.name, timeoutMs);
        log.info(`  [${company.type}] ${company.name}: ${postings.length} postings`);
        return postings;
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        log.error(`Skipping ${company.name} (${company.type}/${company.board}): ${message}`);
        failures.push({ company: company.name, type: company.type, board: company.board, error: message });
        return [];
      }
    }),
  );

  const postings = results.flat();
  log.info(`Fetched ${postings.length} postings (${failures.length} companies failed)`);
  return { postings, failures };
}
