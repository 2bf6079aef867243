import { z } from 'zod';
import type { Outcome } from './outcome.js';
import { extractPointOutcome } from './outcome.js';

export interface TestPlan {
  id: string;
  name: string;
}

export interface Suite {
  id: string;
  name: string;
  parentId?: string;
}

export interface TestCaseRef {
  id: number;
  name?: string;
}

export interface TestPoint {
  id: number;
  suiteId: string;
  testCase?: TestCaseRef;
  /** Raw outcome picked from the point's outcome-bearing fields. */
  outcome?: string;
  configurationName?: string;
}

export interface TestRun {
  id: number;
  name?: string;
  planId?: string;
  isAutomated?: boolean;
  createdDate?: string;
  lastUpdatedDate?: string;
  completedDate?: string;
}

export interface TestResult {
  id: number;
  pointId?: number;
  outcome?: string;
  state?: string;
  startedDate?: string;
  completedDate?: string;
  durationInMs?: number;
  testCase?: TestCaseRef;
  configurationName?: string;
  ownerName?: string;
  priority?: number;
}

export interface AggregatedTestCase {
  topSuiteId: string;
  topSuiteName: string;
  testCaseId: number;
  testCaseName?: string;
  outcome: Outcome;
  /** Distinct suite paths the test case was observed under, sorted. */
  paths: string[];
  numPaths: number;
}

export interface ResultRow {
  planId: string;
  topSuiteId: string;
  topSuiteName: string;
  runId: number;
  runName?: string;
  automated?: boolean;
  suitePath: string;
  resultId: number;
  outcome?: string;
  state?: string;
  pointId: number;
  testCaseId?: number;
  testCaseName?: string;
  startedDate?: string;
  completedDate?: string;
  durationInMs?: number;
  configurationName?: string;
  ownerName?: string;
  priority?: number;
}

// ADO returns ids as numbers on some endpoints and as strings on others
const idSchema = z.union([z.number(), z.string()]);
const optionalString = z.string().nullish().transform((value) => value ?? undefined);
const named = z.object({ name: z.string().nullish() }).passthrough().nullish();
const outcomeCarrier = z.object({ outcome: z.string().nullish() }).passthrough().nullish();

const testCaseSchema = z
  .object({ id: idSchema.nullish(), name: z.string().nullish() })
  .passthrough()
  .nullish();

export const rawPlanSchema = z.object({ id: idSchema, name: z.string() }).passthrough();

export const rawSuiteSchema = z
  .object({
    id: idSchema,
    name: z.string().nullish(),
    parentSuite: z.object({ id: idSchema.nullish() }).passthrough().nullish(),
  })
  .passthrough();

export const rawPointSchema = z
  .object({
    id: idSchema,
    testCase: testCaseSchema,
    outcome: z.string().nullish(),
    mostRecentResult: outcomeCarrier,
    lastTestRun: outcomeCarrier,
    lastResultDetails: outcomeCarrier,
    configuration: named,
  })
  .passthrough();

export const rawRunSchema = z
  .object({
    id: idSchema,
    name: optionalString,
    plan: z.object({ id: idSchema.nullish() }).passthrough().nullish(),
    isAutomated: z.boolean().nullish(),
    createdDate: optionalString,
    lastUpdatedDate: optionalString,
    completedDate: optionalString,
  })
  .passthrough();

export const rawResultSchema = z
  .object({
    id: idSchema,
    testPoint: z.object({ id: idSchema.nullish() }).passthrough().nullish(),
    pointId: idSchema.nullish(),
    outcome: optionalString,
    state: optionalString,
    startedDate: optionalString,
    completedDate: optionalString,
    durationInMs: z.number().nullish(),
    testCase: testCaseSchema,
    testCaseTitle: z.string().nullish(),
    configuration: named,
    owner: z.object({ displayName: z.string().nullish() }).passthrough().nullish(),
    priority: z.number().nullish(),
  })
  .passthrough();

export type RawPoint = z.infer<typeof rawPointSchema>;

export function toNumericId(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined || value === '') {
    return undefined;
  }
  const numeric = typeof value === 'number' ? value : Number(value);
  return Number.isInteger(numeric) ? numeric : undefined;
}

function toTestCaseRef(raw: z.infer<typeof testCaseSchema>, fallbackName?: string | null): TestCaseRef | undefined {
  const id = toNumericId(raw?.id);
  if (id === undefined) {
    return undefined;
  }
  const name = raw?.name || fallbackName || undefined;
  return name ? { id, name } : { id };
}

export function normalizePlan(raw: unknown): TestPlan | undefined {
  const parsed = rawPlanSchema.safeParse(raw);
  if (!parsed.success) return undefined;
  return { id: String(parsed.data.id), name: parsed.data.name };
}

export function normalizeSuite(raw: unknown): Suite | undefined {
  const parsed = rawSuiteSchema.safeParse(raw);
  if (!parsed.success) return undefined;

  const { id, name, parentSuite } = parsed.data;
  const parentId = parentSuite?.id;
  const suite: Suite = { id: String(id), name: name ?? String(id) };
  if (parentId !== null && parentId !== undefined) {
    suite.parentId = String(parentId);
  }
  return suite;
}

export function normalizePoint(raw: unknown, suiteId: string): TestPoint | undefined {
  const parsed = rawPointSchema.safeParse(raw);
  if (!parsed.success) return undefined;

  const id = toNumericId(parsed.data.id);
  if (id === undefined) return undefined;

  const point: TestPoint = { id, suiteId };
  const testCase = toTestCaseRef(parsed.data.testCase);
  if (testCase) point.testCase = testCase;
  const outcome = extractPointOutcome(parsed.data);
  if (outcome) point.outcome = outcome;
  const configurationName = parsed.data.configuration?.name;
  if (configurationName) point.configurationName = configurationName;
  return point;
}

export function normalizeRun(raw: unknown): TestRun | undefined {
  const parsed = rawRunSchema.safeParse(raw);
  if (!parsed.success) return undefined;

  const id = toNumericId(parsed.data.id);
  if (id === undefined) return undefined;

  const planId = parsed.data.plan?.id;
  return {
    id,
    name: parsed.data.name,
    planId: planId === null || planId === undefined ? undefined : String(planId),
    isAutomated: parsed.data.isAutomated ?? undefined,
    createdDate: parsed.data.createdDate,
    lastUpdatedDate: parsed.data.lastUpdatedDate,
    completedDate: parsed.data.completedDate,
  };
}

/**
 * Results reference their point either as a nested `testPoint.id` or as a flat
 * `pointId`; the nested form wins when both are present.
 */
export function normalizeResult(raw: unknown): TestResult | undefined {
  const parsed = rawResultSchema.safeParse(raw);
  if (!parsed.success) return undefined;

  const data = parsed.data;
  const id = toNumericId(data.id);
  if (id === undefined) return undefined;

  return {
    id,
    pointId: toNumericId(data.testPoint?.id) ?? toNumericId(data.pointId),
    outcome: data.outcome,
    state: data.state,
    startedDate: data.startedDate,
    completedDate: data.completedDate,
    durationInMs: data.durationInMs ?? undefined,
    testCase: toTestCaseRef(data.testCase, data.testCaseTitle),
    configurationName: data.configuration?.name ?? undefined,
    ownerName: data.owner?.displayName ?? undefined,
    priority: data.priority ?? undefined,
  };
}
