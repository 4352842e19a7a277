import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { RunStatus, RunSummary } from './types.js';

export const STATUS_PATH = 'data/last_run_status.json';

/** A run fails only when new postings were found and the email did not go out. */
export function buildRunStatus(
  summary: RunSummary,
  isDryRun: boolean,
  startTime: number,
  finishedAt: Date = new Date(),
): RunStatus {
  const sendFailed = summary.postingsNew > 0 && !isDryRun && !summary.emailSent;
  const errors = summary.failures.map((f) => `${f.company} (${f.type}/${f.board}): ${f.error}`);
  if (sendFailed) errors.push('Email send failed');

  return {
    timestamp: finishedAt.toISOString(),
    success: !sendFailed,
    jobsFetched: summary.postingsFetched,
    jobsMatched: summary.postingsMatched,
    jobsNew: summary.postingsNew,
    emailSent: summary.emailSent,
    durationMs: finishedAt.getTime() - startTime,
    errors,
  };
}

export function buildErrorStatus(error: string, startTime: number, finishedAt: Date = new Date()): RunStatus {
  return {
    timestamp: finishedAt.toISOString(),
    success: false,
    jobsFetched: 0,
    jobsMatched: 0,
    jobsNew: 0,
    emailSent: false,
    durationMs: finishedAt.getTime() - startTime,
    errors: [error],
  };
}

export function exitCodeFor(status: RunStatus): number {
  return status.success ? 0 : 1;
}

export function writeStatus(status: RunStatus, path: string = STATUS_PATH): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(status, null, 2));
}
