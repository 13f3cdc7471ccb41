/**
 * Work Item Aggregator
 * Collects the caller's work items in one iteration together with their comment threads.
 */

import { AzureDevOpsClient } from '../client/azure-devops-client.js';
import { AzureComment, AzureIteration, AzureWorkItem, IdentityField } from '../client/schemas.js';
import { AzureDevOpsConfig, SprintAggregation, WorkItem, WorkItemComment } from '../types/index.js';
import { escapeWiqlValue, stripHtml } from '../utils/text.js';

/**
 * WIQL selecting items under the iteration that the caller created or is assigned to.
 */
export function buildSprintWiql(iterationPath: string): string {
  return (
    'SELECT [System.Id] ' +
    'FROM WorkItems ' +
    `WHERE [System.IterationPath] UNDER '${escapeWiqlValue(iterationPath)}' ` +
    'AND ([System.CreatedBy] = @Me OR [System.AssignedTo] = @Me) ' +
    'ORDER BY [System.ChangedDate] DESC'
  );
}

export function buildWorkItemUrl(config: AzureDevOpsConfig, workItemId: number): string {
  return `${config.organizationUrl}/${encodeURIComponent(config.project)}/_workitems/edit/${workItemId}`;
}

function identityName(identity: IdentityField | undefined): string | null {
  if (identity === undefined) {
    return null;
  }
  if (typeof identity === 'string') {
    return identity;
  }
  return identity.displayName ?? null;
}

function identityId(identity: IdentityField | undefined): string | null {
  return identity !== undefined && typeof identity !== 'string' ? identity.id ?? null : null;
}

function toComment(comment: AzureComment): WorkItemComment {
  return {
    id: comment.id,
    text: stripHtml(comment.text),
    created_by: comment.createdBy?.displayName ?? null,
    created_date: comment.createdDate ?? null,
  };
}

export function toWorkItem(
  config: AzureDevOpsConfig,
  workItem: AzureWorkItem,
  comments: WorkItemComment[]
): WorkItem {
  const fields = workItem.fields;
  return {
    id: workItem.id,
    title: fields['System.Title'] ?? 'N/A',
    state: fields['System.State'] ?? 'N/A',
    type: fields['System.WorkItemType'] ?? 'N/A',
    assigned_to: identityName(fields['System.AssignedTo']),
    created_by: identityName(fields['System.CreatedBy']),
    created_date: fields['System.CreatedDate'] ?? null,
    changed_date: fields['System.ChangedDate'] ?? null,
    changed_by: identityName(fields['System.ChangedBy']),
    description: stripHtml(fields['System.Description']),
    tags: fields['System.Tags'] ?? null,
    iteration_path: fields['System.IterationPath'] ?? null,
    comments_count: fields['System.CommentCount'] ?? 0,
    comments,
    web_url: buildWorkItemUrl(config, workItem.id),
  };
}

/**
 * Fetch comments for one item. A failure here degrades to an empty thread
 * instead of failing the whole sprint.
 */
async function fetchCommentsOrEmpty(
  client: AzureDevOpsClient,
  workItem: AzureWorkItem
): Promise<WorkItemComment[]> {
  if ((workItem.fields['System.CommentCount'] ?? 0) <= 0) {
    return [];
  }

  try {
    const comments = await client.getComments(workItem.id);
    return comments.map(toComment);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    console.error(`[WARNING] Comments for work item ${workItem.id} unavailable, returning none: ${reason}`);
    return [];
  }
}

export interface AggregationOptions {
  /** Resolve the PAT owner and count created/assigned items; the summary leaves this off. */
  countOwnership?: boolean;
}

export async function aggregateSprintWorkItems(
  client: AzureDevOpsClient,
  config: AzureDevOpsConfig,
  iteration: AzureIteration,
  options: AggregationOptions = {}
): Promise<SprintAggregation> {
  const countOwnership = options.countOwnership ?? true;
  const [ids, me] = await Promise.all([
    client.queryWorkItemIds(buildSprintWiql(iteration.path)),
    countOwnership ? client.getAuthenticatedUser() : Promise.resolve(null),
  ]);

  if (ids.length === 0) {
    return { workItems: [], createdByMe: 0, assignedToMe: 0 };
  }

  const azureWorkItems = await client.getWorkItems(ids);

  // Completion order does not matter; Promise.all keeps the query order.
  const workItems = await Promise.all(
    azureWorkItems.map(async (workItem) =>
      toWorkItem(config, workItem, await fetchCommentsOrEmpty(client, workItem))
    )
  );

  let createdByMe = 0;
  let assignedToMe = 0;
  if (me) {
    for (const workItem of azureWorkItems) {
      if (identityId(workItem.fields['System.CreatedBy']) === me.id) {
        createdByMe++;
      }
      if (identityId(workItem.fields['System.AssignedTo']) === me.id) {
        assignedToMe++;
      }
    }
  }

  return { workItems, createdByMe, assignedToMe };
}
