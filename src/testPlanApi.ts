import type { AzureDevOpsClient } from './azureDevOpsClient.js';
import { NotFoundError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { Suite, TestPlan, TestPoint, TestResult, TestRun } from './models.js';
import { normalizePlan, normalizePoint, normalizeResult, normalizeRun, normalizeSuite } from './models.js';
import { extractRecords, type VersionedPaginationClient } from './paginationClient.js';

export const API_VERSIONS = {
  testPlan: '7.1-preview.1',
  points: ['7.1-preview.2', '7.1-preview.1', '7.0', '6.0'],
  runs: ['7.1-preview.7', '7.1-preview.1', '7.0', '6.0'],
  results: ['7.1-preview.6', '7.1-preview.1', '7.0', '6.0'],
} as const;

export interface RunWindow {
  minLastUpdatedDate?: string;
  maxLastUpdatedDate?: string;
}

/**
 * Exact case-insensitive name match first, then substring. The first listed plan
 * wins within either tier.
 */
export function selectPlan(plans: readonly TestPlan[], planName: string): TestPlan {
  const wanted = planName.trim().toLowerCase();
  if (!wanted) {
    throw new NotFoundError('A test plan name is required');
  }

  const exact = plans.find((plan) => plan.name.trim().toLowerCase() === wanted);
  if (exact) return exact;

  const partial = plans.find((plan) => plan.name.toLowerCase().includes(wanted));
  if (partial) return partial;

  throw new NotFoundError(`Test plan '${planName}' not found`);
}

/** Newest first by last update, falling back to completion time. */
export function sortRunsNewestFirst(runs: readonly TestRun[]): TestRun[] {
  const stamp = (run: TestRun) => run.lastUpdatedDate ?? run.completedDate ?? '';
  return [...runs].sort((a, b) => stamp(b).localeCompare(stamp(a)));
}

function compact<T>(items: ReadonlyArray<T | undefined>): T[] {
  return items.filter((item): item is T => item !== undefined);
}

export class TestPlanApi {
  private client: AzureDevOpsClient;
  private pagination: VersionedPaginationClient;
  private logger: Logger;

  constructor(client: AzureDevOpsClient, pagination: VersionedPaginationClient, logger: Logger = silentLogger) {
    this.client = client;
    this.pagination = pagination;
    this.logger = logger;
  }

  async listPlans(): Promise<TestPlan[]> {
    const response = await this.client.get('/_apis/testplan/plans', {
      'api-version': API_VERSIONS.testPlan,
    });
    return this.normalizeAll('plan', extractRecords(response.body, 'value'), normalizePlan);
  }

  async resolvePlan(planName: string): Promise<TestPlan> {
    const plan = selectPlan(await this.listPlans(), planName);
    this.logger.info(`Resolved plan '${plan.name}'`, { planId: plan.id });
    return plan;
  }

  async listSuites(planId: string): Promise<Suite[]> {
    const response = await this.client.get(`/_apis/testplan/Plans/${encodeURIComponent(planId)}/suites`, {
      'api-version': API_VERSIONS.testPlan,
    });
    // older revisions answer with `suites` instead of `value`
    let records = extractRecords(response.body, 'value');
    if (records.length === 0) {
      records = extractRecords(response.body, 'suites');
    }
    return this.normalizeAll('suite', records, normalizeSuite);
  }

  async listPoints(planId: string, suiteId: string): Promise<TestPoint[]> {
    const records = await this.pagination.fetchAll('/_apis/test/points', {
      versions: API_VERSIONS.points,
      params: {
        planId,
        suiteId,
        includePointDetails: true,
        returnIdentityRef: true,
      },
    });
    return this.normalizeAll('point', records, (raw) => normalizePoint(raw, suiteId));
  }

  async listRuns(planId: string, window: RunWindow = {}): Promise<TestRun[]> {
    const records = await this.pagination.fetchAll('/_apis/test/runs', {
      versions: API_VERSIONS.runs,
      params: {
        planId,
        minLastUpdatedDate: window.minLastUpdatedDate,
        maxLastUpdatedDate: window.maxLastUpdatedDate,
      },
    });
    const runs = this.normalizeAll('run', records, normalizeRun);
    this.logger.info(`${runs.length} run(s) for plan ${planId}`);
    return sortRunsNewestFirst(runs);
  }

  async listResults(runId: number): Promise<TestResult[]> {
    const records = await this.pagination.fetchAll(`/_apis/test/Runs/${runId}/results`, {
      versions: API_VERSIONS.results,
    });
    return this.normalizeAll('result', records, normalizeResult);
  }

  private normalizeAll<T>(kind: string, records: unknown[], normalize: (raw: unknown) => T | undefined): T[] {
    const normalized = records.map(normalize);
    const dropped = normalized.filter((item) => item === undefined).length;
    if (dropped > 0) {
      this.logger.debug(`Dropped ${dropped} malformed ${kind} record(s)`);
    }
    return compact(normalized);
  }
}
