import { z } from 'zod';
import type { AzureDevOpsClient } from './azureDevOpsClient.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { extractRecords } from './paginationClient.js';
import { toNumericId } from './models.js';

export const WIQL_API_VERSION = '6.0';
export const WORK_ITEMS_BATCH_SIZE = 200;

export const BUG_FIELDS = [
  'System.Id',
  'System.WorkItemType',
  'System.Title',
  'System.AssignedTo',
  'System.State',
  'System.Tags',
  'Microsoft.VSTS.Common.Severity',
  'Microsoft.VSTS.Common.ClosedDate',
  'System.CreatedDate',
] as const;

export interface BugQuery {
  project: string;
  areaPath: string;
  iterationPath: string;
  createdFrom: Date;
  createdTo: Date;
}

export interface Bug {
  id: number;
  title: string;
  state?: string;
  severity?: string;
  assignedTo?: string;
  tags: string[];
  createdDate?: string;
  closedDate?: string;
}

export type WorkItemFields = Record<string, unknown>;

const wiqlResponseSchema = z
  .object({
    workItems: z.array(z.object({ id: z.union([z.number(), z.string()]) }).passthrough()).nullish(),
  })
  .passthrough();

const workItemSchema = z.object({ fields: z.record(z.unknown()) }).passthrough();

function wiqlLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Bugs under one area and iteration created inside [createdFrom, createdTo].
 */
export function buildBugQuery(query: BugQuery): string {
  return [
    `SELECT ${BUG_FIELDS.map((field) => `[${field}]`).join(', ')}`,
    'FROM workitems',
    `WHERE [System.TeamProject] = ${wiqlLiteral(query.project)}`,
    `AND [System.WorkItemType] = 'Bug'`,
    `AND [System.AreaPath] = ${wiqlLiteral(query.areaPath)}`,
    `AND [System.IterationPath] = ${wiqlLiteral(query.iterationPath)}`,
    `AND [System.CreatedDate] >= ${wiqlLiteral(query.createdFrom.toISOString())}`,
    `AND [System.CreatedDate] <= ${wiqlLiteral(query.createdTo.toISOString())}`,
  ].join('\n');
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') return value || undefined;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function identityName(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null) {
    return text(Reflect.get(value, 'displayName')) ?? text(Reflect.get(value, 'uniqueName'));
  }
  return text(value);
}

export function toBug(fields: WorkItemFields): Bug | undefined {
  const rawId = fields['System.Id'];
  const id = toNumericId(typeof rawId === 'number' || typeof rawId === 'string' ? rawId : undefined);
  if (id === undefined) {
    return undefined;
  }
  const tags = (text(fields['System.Tags']) ?? '')
    .split(';')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);

  return {
    id,
    title: text(fields['System.Title']) ?? '',
    state: text(fields['System.State']),
    severity: text(fields['Microsoft.VSTS.Common.Severity']),
    assignedTo: identityName(fields['System.AssignedTo']),
    tags,
    createdDate: text(fields['System.CreatedDate']),
    closedDate: text(fields['Microsoft.VSTS.Common.ClosedDate']),
  };
}

export class WorkItemApi {
  private client: AzureDevOpsClient;
  private logger: Logger;

  constructor(client: AzureDevOpsClient, logger: Logger = silentLogger) {
    this.client = client;
    this.logger = logger;
  }

  async queryWorkItemIds(wiql: string): Promise<number[]> {
    const response = await this.client.post('/_apis/wit/wiql', { query: wiql }, {
      'api-version': WIQL_API_VERSION,
    });
    const parsed = wiqlResponseSchema.safeParse(response.body);
    if (!parsed.success) {
      this.logger.warn('WIQL response had no workItems list');
      return [];
    }
    const ids: number[] = [];
    for (const item of parsed.data.workItems ?? []) {
      const id = toNumericId(item.id);
      if (id !== undefined) ids.push(id);
    }
    this.logger.info(`WIQL matched ${ids.length} work item(s)`);
    return ids;
  }

  /**
   * Field maps for the given ids, requested in batches the endpoint accepts.
   */
  async getWorkItems(
    ids: readonly number[],
    fields: readonly string[],
    batchSize: number = WORK_ITEMS_BATCH_SIZE
  ): Promise<WorkItemFields[]> {
    const items: WorkItemFields[] = [];
    for (let i = 0; i < ids.length; i += batchSize) {
      const batch = ids.slice(i, i + batchSize);
      const response = await this.client.post(
        '/_apis/wit/workitemsbatch',
        { ids: batch, fields },
        { 'api-version': WIQL_API_VERSION },
        'organization'
      );
      for (const record of extractRecords(response.body, 'value')) {
        const parsed = workItemSchema.safeParse(record);
        if (parsed.success) {
          items.push(parsed.data.fields);
        }
      }
    }
    return items;
  }

  async listBugs(query: BugQuery): Promise<Bug[]> {
    const ids = await this.queryWorkItemIds(buildBugQuery(query));
    if (ids.length === 0) {
      return [];
    }
    const fields = await this.getWorkItems(ids, BUG_FIELDS);
    const bugs: Bug[] = [];
    for (const item of fields) {
      const bug = toBug(item);
      if (bug) bugs.push(bug);
    }
    return bugs;
  }
}
