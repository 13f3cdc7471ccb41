/**
 * Unit tests for sprint work item aggregation
 */

import { AzureDevOpsClient } from '../../src/client/azure-devops-client';
import { AzureIteration } from '../../src/client/schemas';
import { AuthenticationRejectedError } from '../../src/errors/index';
import {
  aggregateSprintWorkItems,
  buildSprintWiql,
  buildWorkItemUrl,
  toWorkItem,
} from '../../src/handlers/work-item-aggregator';
import {
  ME,
  OTHER,
  PATHS,
  TEST_CONFIG,
  TEST_PAT,
  createFakeAzureDevOps,
  createSprintBackend,
  json,
} from '../helpers/fake-azure-devops';

const SPRINT_37: AzureIteration = { id: 'b', name: 'Sprint 37', path: 'TestProject\\Sprint 37' };

describe('buildSprintWiql', () => {
  it('should scope the query to the iteration and the caller', () => {
    expect(buildSprintWiql('TestProject\\Sprint 37')).toBe(
      "SELECT [System.Id] FROM WorkItems WHERE [System.IterationPath] UNDER 'TestProject\\Sprint 37' " +
        'AND ([System.CreatedBy] = @Me OR [System.AssignedTo] = @Me) ORDER BY [System.ChangedDate] DESC'
    );
  });

  it('should escape single quotes in the iteration path', () => {
    expect(buildSprintWiql("TestProject\\Ops' Sprint")).toContain("UNDER 'TestProject\\Ops'' Sprint'");
  });
});

describe('toWorkItem', () => {
  it('should map fields, strip HTML and default missing values', () => {
    const workItem = toWorkItem(
      TEST_CONFIG,
      {
        id: 42,
        fields: {
          'System.AssignedTo': 'Legacy Name <legacy@example.com>',
          'System.Description': '<div>Hello&nbsp;<b>world</b></div>',
          'System.Tags': 'backend; auth',
        },
      },
      []
    );

    expect(workItem).toEqual({
      id: 42,
      title: 'N/A',
      state: 'N/A',
      type: 'N/A',
      assigned_to: 'Legacy Name <legacy@example.com>',
      created_by: null,
      created_date: null,
      changed_date: null,
      changed_by: null,
      description: 'Hello world',
      tags: 'backend; auth',
      iteration_path: null,
      comments_count: 0,
      comments: [],
      web_url: 'https://dev.azure.com/test-org/TestProject/_workitems/edit/42',
    });
  });

  it('should build work item links under the project', () => {
    expect(buildWorkItemUrl({ ...TEST_CONFIG, project: 'My Project' }, 7)).toBe(
      'https://dev.azure.com/test-org/My%20Project/_workitems/edit/7'
    );
  });
});

describe('aggregateSprintWorkItems', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should return items in query order with their comments', async () => {
    const fake = createSprintBackend({
      workItems: [
        { id: 102, title: 'Second by id, first by query', comments: ['<p>looks good</p>'] },
        { id: 101, title: 'Implement login', description: '<p>Login form</p>', comments: ['note1', 'note2'] },
      ],
    });
    const client = new AzureDevOpsClient(TEST_CONFIG, TEST_PAT, { transport: fake.transport });

    const result = await aggregateSprintWorkItems(client, TEST_CONFIG, SPRINT_37);

    expect(result.workItems.map((item) => item.id)).toEqual([102, 101]);
    expect(result.workItems[0].comments).toEqual([
      { id: 1, text: 'looks good', created_by: 'Other User', created_date: '2025-01-07T10:00:00Z' },
    ]);
    expect(result.workItems[1]).toMatchObject({
      title: 'Implement login',
      description: 'Login form',
      comments_count: 2,
      created_by: 'Test User',
      assigned_to: null,
    });
    expect(result.workItems[1].comments.map((comment) => comment.text)).toEqual(['note1', 'note2']);
  });

  it('should count items created by and assigned to the PAT owner', async () => {
    const fake = createSprintBackend({
      workItems: [
        { id: 1, title: 'Mine', createdBy: ME, assignedTo: ME },
        { id: 2, title: 'Assigned to me', createdBy: OTHER, assignedTo: ME },
        { id: 3, title: 'Created by me', createdBy: ME, assignedTo: OTHER },
      ],
    });
    const client = new AzureDevOpsClient(TEST_CONFIG, TEST_PAT, { transport: fake.transport });

    const result = await aggregateSprintWorkItems(client, TEST_CONFIG, SPRINT_37);

    expect(result.createdByMe).toBe(2);
    expect(result.assignedToMe).toBe(2);
  });

  it('should skip the identity lookup when ownership is not counted', async () => {
    const fake = createSprintBackend({ workItems: [{ id: 1, title: 'Mine', createdBy: ME, assignedTo: ME }] });
    const client = new AzureDevOpsClient(TEST_CONFIG, TEST_PAT, { transport: fake.transport });

    const result = await aggregateSprintWorkItems(client, TEST_CONFIG, SPRINT_37, { countOwnership: false });

    expect(result.workItems.map((item) => item.id)).toEqual([1]);
    expect(result.createdByMe).toBe(0);
    expect(result.assignedToMe).toBe(0);
    expect(fake.pathsRequested()).not.toContain(PATHS.connectionData);
  });

  it('should skip the comments call for items without comments', async () => {
    const fake = createSprintBackend({ workItems: [{ id: 5, title: 'Quiet item' }] });
    const client = new AzureDevOpsClient(TEST_CONFIG, TEST_PAT, { transport: fake.transport });

    const result = await aggregateSprintWorkItems(client, TEST_CONFIG, SPRINT_37);

    expect(result.workItems[0].comments).toEqual([]);
    expect(fake.pathsRequested()).not.toContain(PATHS.comments(5));
  });

  it('should degrade one failing comment thread to an empty list', async () => {
    const fake = createSprintBackend({
      workItems: [
        { id: 1, title: 'Broken comments', comments: ['lost'] },
        { id: 2, title: 'Healthy comments', comments: ['kept'] },
      ],
      failingComments: [1],
    });
    const client = new AzureDevOpsClient(TEST_CONFIG, TEST_PAT, { transport: fake.transport });

    const result = await aggregateSprintWorkItems(client, TEST_CONFIG, SPRINT_37);

    expect(result.workItems.map((item) => item.comments.map((comment) => comment.text))).toEqual([[], ['kept']]);
    expect(errorSpy).toHaveBeenCalledWith(
      '[WARNING] Comments for work item 1 unavailable, returning none: Azure DevOps request failed'
    );
  });

  it('should not fetch work items when the query is empty', async () => {
    const fake = createSprintBackend({ workItems: [] });
    const client = new AzureDevOpsClient(TEST_CONFIG, TEST_PAT, { transport: fake.transport });

    const result = await aggregateSprintWorkItems(client, TEST_CONFIG, SPRINT_37);

    expect(result).toEqual({ workItems: [], createdByMe: 0, assignedToMe: 0 });
    expect(fake.pathsRequested()).not.toContain(PATHS.workItems);
  });

  it('should fail the whole aggregation when the query is rejected', async () => {
    const fake = createFakeAzureDevOps([
      { method: 'POST', path: PATHS.wiql, respond: () => ({ statusCode: 401, body: '' }) },
      { path: PATHS.connectionData, respond: () => json({ authenticatedUser: { id: ME.id } }) },
    ]);
    const client = new AzureDevOpsClient(TEST_CONFIG, TEST_PAT, { transport: fake.transport });

    await expect(aggregateSprintWorkItems(client, TEST_CONFIG, SPRINT_37)).rejects.toBeInstanceOf(
      AuthenticationRejectedError
    );
  });

  it('should send the WIQL for the resolved iteration path', async () => {
    const fake = createSprintBackend({ workItems: [] });
    const client = new AzureDevOpsClient(TEST_CONFIG, TEST_PAT, { transport: fake.transport });

    await aggregateSprintWorkItems(client, TEST_CONFIG, { id: 'x', name: 'Sprint 9', path: 'TestProject\\Q1\\Sprint 9' });

    const wiqlRequest = fake.requests.find((request) => request.method === 'POST');
    expect(JSON.parse(wiqlRequest?.body ?? '{}').query).toContain("UNDER 'TestProject\\Q1\\Sprint 9'");
  });
});
