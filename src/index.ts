import 'dotenv/config';
import { log } from './logger.js';
import { loadCompanies, loadConfig, loadEmailEnv, loadNonUsCities, loadUsStates } from './config.js';
import { createFilterConfig, FilterEngine } from './matcher.js';
import { FileSeenStore } from './cache.js';
import { ResendNotifier } from './emailer.js';
import { runPipeline } from './pipeline.js';
import { buildErrorStatus, buildRunStatus, exitCodeFor, STATUS_PATH, writeStatus } from './status.js';

function argValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

async function main(startTime: number): Promise<void> {
  const args = process.argv.slice(2);
  const isValidate = args.includes('--validate');
  const isDryRun = args.includes('--dry-run');

  // 1. Load and validate config
  const config = loadConfig(argValue(args, '--config') ?? './config.yaml');
  const companies = loadCompanies(config.registry.path);
  const filterConfig = createFilterConfig(config.filters, {
    states: loadUsStates(config.filters.statesPath),
    nonUsCities: loadNonUsCities(config.filters.nonUsCitiesPath),
  });

  if (isValidate) {
    log.info(`Config valid — ${companies.length} companies, ${filterConfig.positiveTitleTerms.size} title terms`);
    return;
  }

  log.info(`Starting job alerts run${isDryRun ? ' (dry-run mode)' : ''}`);

  // 2. Email settings are only required when a digest may actually go out
  const notifier = isDryRun ? undefined : new ResendNotifier(loadEmailEnv());

  // 3. Fetch, filter, dedup, send, persist
  const summary = await runPipeline(
    {
      companies,
      filter: new FilterEngine(filterConfig),
      store: new FileSeenStore(config.cache.path),
      notifier,
    },
    {
      subjectPrefix: config.email.subjectPrefix,
      maxAgeDays: config.cache.maxAgeDays,
      fetchTimeoutMs: config.fetch.timeoutMs,
      dryRun: isDryRun,
    },
  );

  // 4. Write run status
  const status = buildRunStatus(summary, isDryRun, startTime);
  writeStatus(status);
  log.info(`Run complete — status written to ${STATUS_PATH}`);

  process.exitCode = exitCodeFor(status);
}

const pipelineStart = Date.now();
main(pipelineStart).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  log.error(message);
  writeStatus(buildErrorStatus(message, pipelineStart));
  process.exitCode = 1;
});
