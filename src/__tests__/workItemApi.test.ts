import { describe, it, expect, beforeEach } from '@jest/globals';
import { z } from 'zod';
import { AzureDevOpsClient } from '../azureDevOpsClient.js';
import { buildBugQuery, toBug, WorkItemApi, type BugQuery } from '../workItemApi.js';
import { FakeTransport, testConfig } from './helpers/fakeTransport.js';

const batchBody = z.object({ ids: z.array(z.number()), fields: z.array(z.string()) });

const query: BugQuery = {
  project: 'test-project',
  areaPath: "Web\\Team's Area",
  iterationPath: 'Web\\Sprint 1',
  createdFrom: new Date('2024-01-01T00:00:00Z'),
  createdTo: new Date('2024-01-31T23:59:59Z'),
};

describe('buildBugQuery', () => {
  it('should filter bugs by area, iteration and creation window', () => {
    expect(buildBugQuery(query).split('\n')).toEqual([
      'SELECT [System.Id], [System.WorkItemType], [System.Title], [System.AssignedTo], [System.State], ' +
        '[System.Tags], [Microsoft.VSTS.Common.Severity], [Microsoft.VSTS.Common.ClosedDate], [System.CreatedDate]',
      'FROM workitems',
      "WHERE [System.TeamProject] = 'test-project'",
      "AND [System.WorkItemType] = 'Bug'",
      "AND [System.AreaPath] = 'Web\\Team''s Area'",
      "AND [System.IterationPath] = 'Web\\Sprint 1'",
      "AND [System.CreatedDate] >= '2024-01-01T00:00:00.000Z'",
      "AND [System.CreatedDate] <= '2024-01-31T23:59:59.000Z'",
    ]);
  });
});

describe('toBug', () => {
  it('should flatten identity and tag fields', () => {
    expect(
      toBug({
        'System.Id': 7,
        'System.Title': 'Checkout crashes',
        'System.State': 'Active',
        'System.Tags': 'Exploratory; UI ;',
        'System.AssignedTo': { displayName: 'Dana', uniqueName: 'dana@example.com' },
        'Microsoft.VSTS.Common.Severity': '2 - High',
        'System.CreatedDate': '2024-01-02T00:00:00Z',
      })
    ).toEqual({
      id: 7,
      title: 'Checkout crashes',
      state: 'Active',
      severity: '2 - High',
      assignedTo: 'Dana',
      tags: ['Exploratory', 'UI'],
      createdDate: '2024-01-02T00:00:00Z',
    });
  });

  it('should fall back to the unique name of the assignee', () => {
    expect(toBug({ 'System.Id': '8', 'System.AssignedTo': { uniqueName: 'sam@example.com' } })).toEqual({
      id: 8,
      title: '',
      assignedTo: 'sam@example.com',
      tags: [],
    });
  });

  it('should drop items without an id', () => {
    expect(toBug({ 'System.Title': 'No id' })).toBeUndefined();
  });
});

describe('WorkItemApi', () => {
  let transport: FakeTransport;
  let api: WorkItemApi;

  beforeEach(() => {
    transport = new FakeTransport();
    api = new WorkItemApi(new AzureDevOpsClient(testConfig, { transport }));
  });

  it('should fetch work items in batches of 200 at organization scope', async () => {
    transport.on('/_apis/wit/workitemsbatch', (request) => {
      const { ids } = batchBody.parse(JSON.parse(request.data ?? '{}'));
      return { body: { count: ids.length, value: ids.map((id) => ({ id, fields: { 'System.Id': id } })) } };
    });
    const ids = Array.from({ length: 450 }, (_, i) => i + 1);

    const items = await api.getWorkItems(ids, ['System.Id']);

    expect(items).toHaveLength(450);
    expect(items[449]).toEqual({ 'System.Id': 450 });
    expect(transport.requests.map((request) => batchBody.parse(JSON.parse(request.data ?? '{}')).ids.length)).toEqual([
      200, 200, 50,
    ]);
    expect(transport.requests[0].url).toBe('https://dev.azure.com/test-org/_apis/wit/workitemsbatch?api-version=6.0');
  });

  it('should list bugs matched by the WIQL query', async () => {
    transport
      .on('/_apis/wit/wiql', { body: { queryType: 'flat', workItems: [{ id: 1 }, { id: 2 }] } })
      .on('/_apis/wit/workitemsbatch', {
        body: {
          value: [
            { id: 1, fields: { 'System.Id': 1, 'System.Title': 'First', 'System.State': 'New' } },
            { id: 2, fields: { 'System.Id': 2, 'System.Title': 'Second', 'System.State': 'Closed' } },
          ],
        },
      });

    const bugs = await api.listBugs(query);

    expect(bugs.map((bug) => [bug.id, bug.title, bug.state])).toEqual([
      [1, 'First', 'New'],
      [2, 'Second', 'Closed'],
    ]);
    const [wiql, batch] = transport.requests;
    expect(wiql.url).toBe('https://dev.azure.com/test-org/test-project/_apis/wit/wiql?api-version=6.0');
    expect(wiql.data).toBe(JSON.stringify({ query: buildBugQuery(query) }));
    expect(batchBody.parse(JSON.parse(batch.data ?? '{}')).ids).toEqual([1, 2]);
  });

  it('should skip the batch call when nothing matches', async () => {
    transport.on('/_apis/wit/wiql', { body: { workItems: [] } });

    expect(await api.listBugs(query)).toEqual([]);
    expect(transport.requests).toHaveLength(1);
  });
});
