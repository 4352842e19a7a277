import { loadNonUsCities, loadUsStates } from '../src/config.js';
import { createFilterConfig, FilterEngine, type FilterConfig, type LocationTables } from '../src/matcher.js';
import type { BoardFetcher } from '../src/fetcher.js';
import type { AtsType, Posting } from '../src/types.js';

export const STATES_PATH = 'data/us-states.json';
export const NON_US_CITIES_PATH = 'data/non-us-cities.json';

export function loadLocationTables(): LocationTables {
  return { states: loadUsStates(STATES_PATH), nonUsCities: loadNonUsCities(NON_US_CITIES_PATH) };
}

export function makePosting(overrides: Partial<Posting> = {}): Posting {
  return {
    id: 'greenhouse:acme:1',
    title: 'Data Analyst',
    location: 'Remote - US',
    url: 'https://boards.greenhouse.io/acme/jobs/1',
    company: 'Acme',
    ...overrides,
  };
}

export function makeFilterConfig(
  positiveTitleTerms: string[] = ['data analyst', 'analytics'],
  negativeTitleTerms: string[] = ['senior', 'lead'],
  extraLocationPatterns: string[] = [],
): FilterConfig {
  return createFilterConfig(
    {
      positiveTitleTerms,
      negativeTitleTerms,
      extraLocationPatterns,
      statesPath: STATES_PATH,
      nonUsCitiesPath: NON_US_CITIES_PATH,
    },
    loadLocationTables(),
  );
}

export function makeFilterEngine(): FilterEngine {
  return new FilterEngine(makeFilterConfig());
}

export function fakeFetchers(byBoard: Record<string, Posting[] | Error>): Record<AtsType, BoardFetcher> {
  const fetcher: BoardFetcher = async (board) => {
    const result = byBoard[board];
    if (result instanceof Error) throw result;
    return result ?? [];
  };
  return { greenhouse: fetcher, lever: fetcher, smartrecruiters: fetcher };
}
