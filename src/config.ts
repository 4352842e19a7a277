import { z } from 'zod';
import { readFileSync } from 'node:fs';
import YAML from 'yaml';
import { log } from './logger.js';
import type { CompanyEntry } from './types.js';

export const ConfigSchema = z.object({
  filters: z.object({
    positiveTitleTerms: z.array(z.string().min(1)).min(1, 'At least one positive title term required'),
    negativeTitleTerms: z.array(z.string().min(1)).default([]),
    extraLocationPatterns: z.array(z.string().min(1)).default([]),
    statesPath: z.string().min(1).default('data/us-states.json'),
    nonUsCitiesPath: z.string().min(1).default('data/non-us-cities.json'),
  }),
  email: z
    .object({
      subjectPrefix: z.string().min(1).default('Job Alerts'),
    })
    .default({}),
  cache: z
    .object({
      path: z.string().min(1).default('data/seen-postings.json'),
      maxAgeDays: z.number().int().positive().default(30),
    })
    .default({}),
  registry: z
    .object({
      path: z.string().min(1).default('companies.json'),
    })
    .default({}),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(30_000),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export const CompanyEntrySchema = z.object({
  name: z.string().min(1),
  type: z.enum(['greenhouse', 'lever', 'smartrecruiters']),
  board: z.string().min(1),
});

export const CompanyRegistrySchema = z.array(CompanyEntrySchema);

export const UsStatesSchema = z.object({
  states: z
    .array(
      z.object({
        name: z.string().min(1),
        abbreviation: z.string().regex(/^[A-Z]{2}$/),
      }),
    )
    .min(1),
});

export type UsState = z.infer<typeof UsStatesSchema>['states'][number];

export const NonUsCitiesSchema = z.object({
  cities: z.array(z.string().min(1)),
});

export const EmailEnvSchema = z.object({
  RESEND_API_KEY: z.string().min(1, 'RESEND_API_KEY is required'),
  SENDER_EMAIL: z.string().email('SENDER_EMAIL must be an email address'),
  RECIPIENT_EMAIL: z.string().email('RECIPIENT_EMAIL must be an email address'),
});

export type EmailEnv = z.infer<typeof EmailEnvSchema>;

function readText(path: string, label: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch {
    throw new Error(`${label} not found: ${path}`);
  }
}

export function loadConfig(path: string): Config {
  log.info(`Loading config from ${path}`);
  const parsed: unknown = YAML.parse(readText(path, 'Config file'));
  return ConfigSchema.parse(parsed);
}

export function loadCompanies(path: string): CompanyEntry[] {
  log.info(`Loading company registry from ${path}`);
  const raw = readText(path, 'Company registry');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Company registry is not valid JSON (${path}): ${message}`);
  }

  const companies = CompanyRegistrySchema.parse(parsed);
  if (companies.length === 0) {
    log.warn('Company registry is empty — nothing will be fetched');
  }
  return companies;
}

export function loadUsStates(path: string): UsState[] {
  const parsed: unknown = JSON.parse(readText(path, 'US states table'));
  return UsStatesSchema.parse(parsed).states;
}

export function loadNonUsCities(path: string): string[] {
  const parsed: unknown = JSON.parse(readText(path, 'Non-US cities table'));
  return NonUsCitiesSchema.parse(parsed).cities;
}

export function loadEmailEnv(env: NodeJS.ProcessEnv = process.env): EmailEnv {
  return EmailEnvSchema.parse(env);
}
