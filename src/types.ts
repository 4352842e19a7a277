export type AtsType = 'greenhouse' | 'lever' | 'smartrecruiters';

export interface CompanyEntry {
  name: string;
  type: AtsType;
  board: string;
}

export interface Posting {
  readonly id: string;
  readonly title: string;
  readonly location: string;
  readonly url: string;
  readonly company: string;
}

export interface FetchFailure {
  company: string;
  type: AtsType;
  board: string;
  error: string;
}

export interface DigestMessage {
  subject: string;
  html: string;
  text: string;
}

export interface RunSummary {
  postingsFetched: number;
  postingsMatched: number;
  postingsNew: number;
  emailSent: boolean;
  cacheSize: number;
  cachePruned: number;
  failures: FetchFailure[];
}

export interface RunStatus {
  timestamp: string;
  success: boolean;
  jobsFetched: number;
  jobsMatched: number;
  jobsNew: number;
  emailSent: boolean;
  durationMs: number;
  errors: string[];
}
