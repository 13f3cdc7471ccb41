import {
  SprintAggregation,
  SprintSummaryResponse,
  SprintWorkItemsResponse,
  WorkItem,
  WorkItemSummary,
} from '../types/index.js';

export function formatFullResponse(sprint: string, aggregation: SprintAggregation): SprintWorkItemsResponse {
  return {
    sprint,
    total_count: aggregation.workItems.length,
    created_by_me: aggregation.createdByMe,
    assigned_to_me: aggregation.assignedToMe,
    work_items: aggregation.workItems,
  };
}

export function toSummaryItem(workItem: WorkItem): WorkItemSummary {
  return {
    title: workItem.title,
    description: workItem.description,
    comments: workItem.comments.map((comment) => comment.text).filter((text) => text !== ''),
  };
}

/**
 * Title, description and comment texts only, for feeding to a language model.
 */
export function formatSummaryResponse(sprint: string, aggregation: SprintAggregation): SprintSummaryResponse {
  const items = aggregation.workItems.map(toSummaryItem);
  return {
    sprint,
    total_count: items.length,
    items,
  };
}
