import { AdoRequestError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import type { AggregatedTestCase, ResultRow, TestPlan, TestPoint } from './models.js';
import { type Outcome, parseOutcome, worse } from './outcome.js';
import { SuiteHierarchy } from './suiteHierarchy.js';
import type { RunWindow, TestPlanApi } from './testPlanApi.js';

export const DEFAULT_BACKFILL_RUN_LIMIT = 50;

export interface AggregationOptions {
  planName: string;
  /** Look at recent runs to fill in points that expose no outcome. Default true. */
  backfill?: boolean;
  backfillRunLimit?: number;
}

export interface BackfillSummary {
  attempted: boolean;
  runsScanned: number;
  pointsCovered: number;
  pointsFilled: number;
  warning?: string;
}

export interface TopSuiteSummary {
  id: string;
  name: string;
  testCases: number;
}

export interface TestCaseReport {
  plan: TestPlan;
  topSuites: TopSuiteSummary[];
  rows: AggregatedTestCase[];
  backfill: BackfillSummary;
}

export interface ResultRowOptions extends RunWindow {
  planName: string;
}

export interface ResultRowReport {
  plan: TestPlan;
  topSuites: Array<{ id: string; name: string; results: number }>;
  rows: ResultRow[];
  runsScanned: number;
}

export interface LatestResult {
  outcome?: string;
  timestamp: string;
}

interface SuitePoints {
  rootId: string;
  path: string;
  points: TestPoint[];
}

interface TestCaseBucket {
  name?: string;
  outcome: Outcome;
  paths: Set<string>;
}

/**
 * Drives plan → suites → points (→ runs → results) and folds everything into
 * per-top-level-suite rows.
 */
export class TestCaseAggregator {
  private api: TestPlanApi;
  private logger: Logger;

  constructor(api: TestPlanApi, logger: Logger = silentLogger) {
    this.api = api;
    this.logger = logger;
  }

  async aggregate(options: AggregationOptions): Promise<TestCaseReport> {
    const plan = await this.api.resolvePlan(options.planName);
    const hierarchy = new SuiteHierarchy(await this.api.listSuites(plan.id));
    const topLevel = hierarchy.topLevel();
    this.logger.info(`Top-level suites: ${topLevel.map((suite) => suite.name).join(', ')}`);

    const observed = await this.collectPoints(plan.id, hierarchy);

    const backfill: BackfillSummary = { attempted: false, runsScanned: 0, pointsCovered: 0, pointsFilled: 0 };
    let latestByPoint = new Map<number, LatestResult>();
    if (options.backfill ?? true) {
      const limit = options.backfillRunLimit ?? DEFAULT_BACKFILL_RUN_LIMIT;
      backfill.attempted = true;
      try {
        const built = await this.buildBackfill(plan.id, limit);
        latestByPoint = built.latestByPoint;
        backfill.runsScanned = built.runsScanned;
        backfill.pointsCovered = latestByPoint.size;
        this.logger.info(`Backfill prepared for ${latestByPoint.size} point(s) from recent runs`);
      } catch (error) {
        if (!(error instanceof AdoRequestError)) {
          throw error;
        }
        backfill.warning = `Could not build backfill from runs/results: ${error.message}`;
        this.logger.warn(backfill.warning, { status: error.status, url: error.url });
      }
    }

    const buckets = new Map<string, Map<number, TestCaseBucket>>(
      topLevel.map((suite) => [suite.id, new Map<number, TestCaseBucket>()])
    );

    for (const { rootId, path, points } of observed) {
      const bucketsForRoot = buckets.get(rootId);
      if (!bucketsForRoot) continue;

      for (const point of points) {
        if (!point.testCase) continue;

        let raw = point.outcome;
        if (!raw) {
          raw = latestByPoint.get(point.id)?.outcome;
          if (raw) backfill.pointsFilled++;
        }

        const existing = bucketsForRoot.get(point.testCase.id);
        if (existing) {
          existing.name = existing.name || point.testCase.name;
          existing.outcome = worse(existing.outcome, parseOutcome(raw));
          existing.paths.add(path);
        } else {
          bucketsForRoot.set(point.testCase.id, {
            name: point.testCase.name,
            outcome: parseOutcome(raw),
            paths: new Set([path]),
          });
        }
      }
    }

    const rows: AggregatedTestCase[] = [];
    const topSuites: TopSuiteSummary[] = [];
    for (const top of topLevel) {
      const cases = buckets.get(top.id) ?? new Map<number, TestCaseBucket>();
      topSuites.push({ id: top.id, name: top.name, testCases: cases.size });
      for (const [testCaseId, bucket] of cases) {
        const paths = [...bucket.paths].sort();
        rows.push({
          topSuiteId: top.id,
          topSuiteName: top.name,
          testCaseId,
          testCaseName: bucket.name,
          outcome: bucket.outcome,
          paths,
          numPaths: paths.length,
        });
      }
      this.logger.info(`${top.name}: ${cases.size} unique test case(s)`);
    }

    return { plan, topSuites, rows, backfill };
  }

  /**
   * Latest result outcome per point id across the most recently updated runs.
   */
  async buildBackfill(
    planId: string,
    runLimit: number
  ): Promise<{ latestByPoint: Map<number, LatestResult>; runsScanned: number }> {
    const runs = (await this.api.listRuns(planId)).slice(0, runLimit);
    const latestByPoint = new Map<number, LatestResult>();

    for (const run of runs) {
      for (const result of await this.api.listResults(run.id)) {
        if (result.pointId === undefined) continue;
        const timestamp = result.completedDate ?? result.startedDate ?? run.lastUpdatedDate ?? '';
        const previous = latestByPoint.get(result.pointId);
        if (!previous || timestamp > previous.timestamp) {
          latestByPoint.set(result.pointId, { outcome: result.outcome, timestamp });
        }
      }
    }
    return { latestByPoint, runsScanned: runs.length };
  }

  /**
   * Flat result rows for every run of the plan (optionally bounded by last update),
   * keeping only results whose point belongs to one of the plan's suites.
   */
  async collectResultRows(options: ResultRowOptions): Promise<ResultRowReport> {
    const plan = await this.api.resolvePlan(options.planName);
    const hierarchy = new SuiteHierarchy(await this.api.listSuites(plan.id));
    const observed = await this.collectPoints(plan.id, hierarchy);

    const pointContext = new Map<number, { rootId: string; path: string }>();
    for (const { rootId, path, points } of observed) {
      for (const point of points) {
        pointContext.set(point.id, { rootId, path });
      }
    }

    const runs = await this.api.listRuns(plan.id, {
      minLastUpdatedDate: options.minLastUpdatedDate,
      maxLastUpdatedDate: options.maxLastUpdatedDate,
    });

    const rows: ResultRow[] = [];
    for (const run of runs) {
      for (const result of await this.api.listResults(run.id)) {
        if (result.pointId === undefined) continue;
        const context = pointContext.get(result.pointId);
        if (!context) continue;

        rows.push({
          planId: plan.id,
          topSuiteId: context.rootId,
          topSuiteName: hierarchy.get(context.rootId).name,
          runId: run.id,
          runName: run.name,
          automated: run.isAutomated,
          suitePath: context.path,
          resultId: result.id,
          outcome: result.outcome,
          state: result.state,
          pointId: result.pointId,
          testCaseId: result.testCase?.id,
          testCaseName: result.testCase?.name,
          startedDate: result.startedDate,
          completedDate: result.completedDate,
          durationInMs: result.durationInMs,
          configurationName: result.configurationName,
          ownerName: result.ownerName,
          priority: result.priority,
        });
      }
    }

    const topSuites = hierarchy.topLevel().map((top) => ({
      id: top.id,
      name: top.name,
      results: rows.filter((row) => row.topSuiteId === top.id).length,
    }));
    return { plan, topSuites, rows, runsScanned: runs.length };
  }

  private async collectPoints(planId: string, hierarchy: SuiteHierarchy): Promise<SuitePoints[]> {
    const observed: SuitePoints[] = [];
    for (const suite of hierarchy.suites) {
      const points = await this.api.listPoints(planId, suite.id);
      if (points.length === 0) continue;

      const rootId = hierarchy.rootAncestorOf(suite.id);
      observed.push({ rootId, path: hierarchy.pathOf(suite.id), points });
      this.logger.debug(
        `Suite '${suite.name}' contributes ${points.length} point(s) to '${hierarchy.get(rootId).name}'`
      );
    }
    return observed;
  }
}
