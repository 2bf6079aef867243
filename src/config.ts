import { z } from 'zod';
import { AuthError, ConfigurationError } from './errors.js';
import type { LogLevel } from './logger.js';

export interface AzureDevOpsConfig {
  orgUrl: string;
  project: string;
  pat: string;
  requestTimeoutMs: number;
}

export interface ReportingConfig extends AzureDevOpsConfig {
  planName?: string;
  outputDir: string;
  backfillRunLimit: number;
  logLevel: LogLevel;
  areaPath?: string;
  iterationPath?: string;
  startDate?: Date;
  endDate?: Date;
}

export type Environment = Record<string, string | undefined>;

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const positiveInt = (fallback: number) =>
  optionalText.pipe(
    z.coerce.number().int().positive().optional().transform((value) => value ?? fallback)
  );

const optionalDate = optionalText.pipe(
  z.coerce.date().optional()
);

const envSchema = z.object({
  ADO_ORG: optionalText,
  ADO_PROJECT: optionalText,
  TEST_PLAN_NAME: optionalText,
  OUTPUT_DIR: optionalText,
  ADO_REQUEST_TIMEOUT_MS: positiveInt(30_000),
  BACKFILL_RUN_LIMIT: positiveInt(50),
  LOG_LEVEL: optionalText.pipe(z.enum(['debug', 'info', 'warn', 'error']).optional()),
  AREA_PATH: optionalText,
  ITERATION_PATH: optionalText,
  START_DATE: optionalDate,
  END_DATE: optionalDate,
});

/**
 * Accepts either an organization name ("contoso") or a full collection URL.
 */
export function resolveOrgUrl(org: string): string {
  const base = /^https?:\/\//i.test(org) ? org : `https://dev.azure.com/${org}`;
  return base.replace(/\/+$/, '');
}

/**
 * Builds the configuration once at process start. Entry points pass
 * `process.env` after dotenv has loaded `.env`; the core only ever sees the result.
 */
export function loadConfig(env: Environment): ReportingConfig {
  const pat = env.ADO_PAT?.trim();
  if (!pat) {
    throw new AuthError('ADO_PAT is required to authenticate against Azure DevOps');
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  if (!values.ADO_ORG) {
    throw new ConfigurationError('ADO_ORG is required (organization name or URL)');
  }
  if (!values.ADO_PROJECT) {
    throw new ConfigurationError('ADO_PROJECT is required');
  }

  return Object.freeze({
    orgUrl: resolveOrgUrl(values.ADO_ORG),
    project: values.ADO_PROJECT,
    pat,
    requestTimeoutMs: values.ADO_REQUEST_TIMEOUT_MS,
    planName: values.TEST_PLAN_NAME,
    outputDir: values.OUTPUT_DIR ?? 'exports',
    backfillRunLimit: values.BACKFILL_RUN_LIMIT,
    logLevel: values.LOG_LEVEL ?? 'info',
    areaPath: values.AREA_PATH,
    iterationPath: values.ITERATION_PATH,
    startDate: values.START_DATE,
    endDate: values.END_DATE,
  });
}
