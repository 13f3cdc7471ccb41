/**
 * Shared types for the sprint work items proxy.
 * Response shapes use snake_case keys because they are serialized as-is.
 */

/**
 * Azure DevOps connection settings, read once at startup and never mutated.
 */
export interface AzureDevOpsConfig {
  organization: string;
  project: string;
  /** Team whose iteration settings define the available sprints. */
  team: string;
  /** Base URL including the organization, e.g. https://dev.azure.com/my-org */
  organizationUrl: string;
  timeoutMs: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface ProxyConfig {
  server: ServerConfig;
  /** Null when organization or project is not configured. */
  azure: AzureDevOpsConfig | null;
  debug: boolean;
}

export interface Sprint {
  name: string;
  path: string;
  start_date: string | null;
  finish_date: string | null;
  time_frame: string | null;
}

export interface SprintListResponse {
  total: number;
  sprints: Sprint[];
}

export interface WorkItemComment {
  id: number;
  text: string;
  created_by: string | null;
  created_date: string | null;
}

export interface WorkItem {
  id: number;
  title: string;
  state: string;
  type: string;
  assigned_to: string | null;
  created_by: string | null;
  created_date: string | null;
  changed_date: string | null;
  changed_by: string | null;
  description: string;
  tags: string | null;
  iteration_path: string | null;
  comments_count: number;
  comments: WorkItemComment[];
  web_url: string;
}

export interface SprintAggregation {
  workItems: WorkItem[];
  createdByMe: number;
  assignedToMe: number;
}

export interface SprintWorkItemsResponse {
  sprint: string;
  total_count: number;
  created_by_me: number;
  assigned_to_me: number;
  work_items: WorkItem[];
}

export interface WorkItemSummary {
  title: string;
  description: string;
  comments: string[];
}

export interface SprintSummaryResponse {
  sprint: string;
  total_count: number;
  items: WorkItemSummary[];
}
