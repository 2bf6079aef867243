import { z } from 'zod';
import {
  computeBurndown,
  listHighSeverity,
  summarizeBurndown,
  summarizeBySeverity,
  summarizeByState,
} from './bugMetrics.js';
import type { ReportingConfig } from './config.js';
import { ConfigurationError, describeError } from './errors.js';
import type { ReportWriter } from './reportWriter.js';
import type { TestCaseAggregator } from './testCaseAggregator.js';
import type { TestPlanApi } from './testPlanApi.js';
import type { BugQuery, WorkItemApi } from './workItemApi.js';

export interface ToolServices {
  config: ReportingConfig;
  testPlans: TestPlanApi;
  aggregator: TestCaseAggregator;
  workItems: WorkItemApi;
  writer: ReportWriter;
}

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, unknown>;
  };
};

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

const bugWindowProperties = {
  areaPath: {
    type: 'string',
    description: 'Optional: area path (defaults to AREA_PATH)',
  },
  iterationPath: {
    type: 'string',
    description: 'Optional: iteration path (defaults to ITERATION_PATH)',
  },
  startDate: {
    type: 'string',
    description: 'Optional: created-from date, ISO format (defaults to START_DATE)',
  },
  endDate: {
    type: 'string',
    description: 'Optional: created-to date, ISO format (defaults to END_DATE)',
  },
};

export const tools: ToolDefinition[] = [
  {
    name: 'list_test_plans',
    description: 'List the test plans of the configured project',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'aggregate_test_cases',
    description:
      'One row per unique test case under each top-level suite of a plan, with the worst observed outcome and the suite paths it appears under',
    inputSchema: {
      type: 'object',
      properties: {
        planName: {
          type: 'string',
          description: 'Optional: plan name, exact or partial (defaults to TEST_PLAN_NAME)',
        },
        backfillRunLimit: {
          type: 'number',
          description: 'Most recently updated runs scanned to fill in missing outcomes (default: BACKFILL_RUN_LIMIT)',
        },
        skipBackfill: {
          type: 'boolean',
          description: 'Use point outcomes only',
        },
        exportCsv: {
          type: 'boolean',
          description: 'Also write CSV files to the output directory',
        },
      },
    },
  },
  {
    name: 'get_test_results',
    description: 'Flat test results of a plan enriched with top-level suite, suite path and run context',
    inputSchema: {
      type: 'object',
      properties: {
        planName: {
          type: 'string',
          description: 'Optional: plan name, exact or partial (defaults to TEST_PLAN_NAME)',
        },
        minLastUpdatedDate: {
          type: 'string',
          description: 'Optional: only runs updated at or after this ISO date',
        },
        maxLastUpdatedDate: {
          type: 'string',
          description: 'Optional: only runs updated at or before this ISO date',
        },
        exportCsv: {
          type: 'boolean',
          description: 'Also write one CSV file per top-level suite',
        },
      },
    },
  },
  {
    name: 'list_bugs',
    description: 'Bugs in an area and iteration created within a date window',
    inputSchema: {
      type: 'object',
      properties: bugWindowProperties,
    },
  },
  {
    name: 'get_bug_burndown',
    description: 'Open and closed bug counts per day over the date window, per tag category, with last-day deltas',
    inputSchema: {
      type: 'object',
      properties: {
        ...bugWindowProperties,
        categories: {
          type: 'object',
          description: 'Optional: category name to tag fragment, e.g. {"exploratory": "exploratory"}',
        },
      },
    },
  },
  {
    name: 'get_bug_summary',
    description: 'Bug counts and shares by state and by severity, plus the severity 4 and 5 bugs',
    inputSchema: {
      type: 'object',
      properties: bugWindowProperties,
    },
  },
];

const planArgs = z.object({
  planName: z.string().optional(),
});

const aggregateArgs = planArgs.extend({
  backfillRunLimit: z.number().int().positive().optional(),
  skipBackfill: z.boolean().optional(),
  exportCsv: z.boolean().optional(),
});

const resultArgs = planArgs.extend({
  minLastUpdatedDate: z.string().optional(),
  maxLastUpdatedDate: z.string().optional(),
  exportCsv: z.boolean().optional(),
});

const bugArgs = z.object({
  areaPath: z.string().optional(),
  iterationPath: z.string().optional(),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
});

const burndownArgs = bugArgs.extend({
  categories: z.record(z.string()).optional(),
});

function textResponse(result: unknown): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(result, null, 2),
      },
    ],
  };
}

function requirePlanName(config: ReportingConfig, planName?: string): string {
  const name = planName ?? config.planName;
  if (!name) {
    throw new ConfigurationError('planName is required (argument or TEST_PLAN_NAME)');
  }
  return name;
}

export function resolveBugQuery(config: ReportingConfig, args: z.infer<typeof bugArgs>): BugQuery {
  const areaPath = args.areaPath ?? config.areaPath;
  const iterationPath = args.iterationPath ?? config.iterationPath;
  const createdFrom = args.startDate ?? config.startDate;
  const createdTo = args.endDate ?? config.endDate;
  if (!areaPath || !iterationPath || !createdFrom || !createdTo) {
    throw new ConfigurationError(
      'areaPath, iterationPath, startDate and endDate are required (arguments or AREA_PATH, ITERATION_PATH, START_DATE, END_DATE)'
    );
  }
  return { project: config.project, areaPath, iterationPath, createdFrom, createdTo };
}

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.infer<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid arguments: ${problems}`);
  }
  return parsed.data;
}

export async function handleToolCall(name: string, args: unknown, services: ToolServices): Promise<ToolResponse> {
  const { config } = services;

  try {
    switch (name) {
      case 'list_test_plans': {
        return textResponse(await services.testPlans.listPlans());
      }

      case 'aggregate_test_cases': {
        const input = parseArgs(aggregateArgs, args);
        const report = await services.aggregator.aggregate({
          planName: requirePlanName(config, input.planName),
          backfill: !input.skipBackfill,
          backfillRunLimit: input.backfillRunLimit ?? config.backfillRunLimit,
        });
        const files = input.exportCsv ? await services.writer.writeTestCaseReport(report) : [];
        return textResponse({ ...report, files });
      }

      case 'get_test_results': {
        const input = parseArgs(resultArgs, args);
        const report = await services.aggregator.collectResultRows({
          planName: requirePlanName(config, input.planName),
          minLastUpdatedDate: input.minLastUpdatedDate,
          maxLastUpdatedDate: input.maxLastUpdatedDate,
        });
        const files = input.exportCsv ? await services.writer.writeResultRows(report) : [];
        return textResponse({ ...report, files });
      }

      case 'list_bugs': {
        const query = resolveBugQuery(config, parseArgs(bugArgs, args));
        return textResponse(await services.workItems.listBugs(query));
      }

      case 'get_bug_burndown': {
        const input = parseArgs(burndownArgs, args);
        const query = resolveBugQuery(config, input);
        const bugs = await services.workItems.listBugs(query);
        const burndown = computeBurndown(bugs, {
          start: query.createdFrom,
          end: query.createdTo,
          categories: input.categories,
        });
        return textResponse({
          totalBugs: bugs.length,
          summary: summarizeBurndown(burndown),
          burndown,
        });
      }

      case 'get_bug_summary': {
        const query = resolveBugQuery(config, parseArgs(bugArgs, args));
        const bugs = await services.workItems.listBugs(query);
        return textResponse({
          totalBugs: bugs.length,
          byState: summarizeByState(bugs),
          bySeverity: summarizeBySeverity(bugs),
          highSeverity: listHighSeverity(bugs),
        });
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    return {
      content: [
        {
          type: 'text',
          text: `Error: ${describeError(error)}`,
        },
      ],
      isError: true,
    };
  }
}
