/**
 * Azure DevOps REST client bound to one caller's PAT.
 * A new instance is created per inbound request; the PAT lives only as long as that instance.
 */

import { z } from 'zod';
import {
  AuthenticationRejectedError,
  NotFoundError,
  UpstreamError,
} from '../errors/index.js';
import { AzureDevOpsConfig } from '../types/index.js';
import { redactSecret, truncate } from '../utils/text.js';
import { HttpResponse, HttpTransport, httpsTransport } from './https-transport.js';
import {
  AuthenticatedUser,
  AzureComment,
  AzureIteration,
  AzureWorkItem,
  CommentListSchema,
  ConnectionDataSchema,
  IterationListSchema,
  WiqlResultSchema,
  WorkItemBatchSchema,
} from './schemas.js';

const API_VERSION = '7.1';
const COMMENTS_API_VERSION = '7.1-preview.4';
const CONNECTION_DATA_API_VERSION = '7.1-preview.1';

/** The /wit/workitems endpoint accepts at most 200 ids per request. */
export const WORK_ITEM_BATCH_SIZE = 200;

export const WORK_ITEM_FIELDS = [
  'System.Id',
  'System.Title',
  'System.State',
  'System.WorkItemType',
  'System.AssignedTo',
  'System.CreatedBy',
  'System.CreatedDate',
  'System.ChangedDate',
  'System.ChangedBy',
  'System.Description',
  'System.Tags',
  'System.IterationPath',
  'System.CommentCount',
] as const;

export interface AzureDevOpsClientOptions {
  transport?: HttpTransport;
  debug?: boolean;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  query?: Record<string, string>;
  body?: unknown;
  /** Named in the NotFoundError raised on a 404. */
  resource: string;
}

export class AzureDevOpsClient {
  private readonly transport: HttpTransport;
  private readonly debug: boolean;

  constructor(
    private readonly config: AzureDevOpsConfig,
    private readonly pat: string,
    options: AzureDevOpsClientOptions = {}
  ) {
    this.transport = options.transport ?? httpsTransport;
    this.debug = options.debug ?? false;
  }

  /**
   * List the iterations configured for the team.
   */
  async listIterations(): Promise<AzureIteration[]> {
    const result = await this.request(
      IterationListSchema,
      `${this.projectUrl()}/${encodeURIComponent(this.config.team)}/_apis/work/teamsettings/iterations`,
      { resource: `Team '${this.config.team}'` }
    );
    return result.value;
  }

  /**
   * Run a WIQL query and return the matching ids in query order.
   */
  async queryWorkItemIds(wiql: string): Promise<number[]> {
    const result = await this.request(WiqlResultSchema, `${this.projectUrl()}/_apis/wit/wiql`, {
      method: 'POST',
      body: { query: wiql },
      resource: `Project '${this.config.project}'`,
    });
    return result.workItems.map((workItem) => workItem.id);
  }

  /**
   * Fetch work items in batches of 200, returned in the order of `ids`.
   * Ids Azure DevOps cannot return (deleted or not visible) are dropped.
   */
  async getWorkItems(ids: number[]): Promise<AzureWorkItem[]> {
    const batches: number[][] = [];
    for (let i = 0; i < ids.length; i += WORK_ITEM_BATCH_SIZE) {
      batches.push(ids.slice(i, i + WORK_ITEM_BATCH_SIZE));
    }

    const results = await Promise.all(
      batches.map((batchIds) =>
        this.request(WorkItemBatchSchema, `${this.projectUrl()}/_apis/wit/workitems`, {
          query: {
            ids: batchIds.join(','),
            fields: WORK_ITEM_FIELDS.join(','),
            errorPolicy: 'omit',
          },
          resource: 'Work items',
        })
      )
    );

    const byId = new Map<number, AzureWorkItem>();
    for (const result of results) {
      for (const workItem of result.value) {
        if (workItem) {
          byId.set(workItem.id, workItem);
        }
      }
    }

    return ids.flatMap((id) => {
      const workItem = byId.get(id);
      return workItem ? [workItem] : [];
    });
  }

  /**
   * Fetch the whole comment thread of a work item, following continuation tokens.
   */
  async getComments(workItemId: number): Promise<AzureComment[]> {
    const comments: AzureComment[] = [];
    let continuationToken: string | undefined;

    do {
      const query: Record<string, string> = {};
      if (continuationToken) {
        query.continuationToken = continuationToken;
      }

      const page = await this.request(
        CommentListSchema,
        `${this.projectUrl()}/_apis/wit/workItems/${workItemId}/comments`,
        { query, resource: `Work item ${workItemId}` }
      );

      comments.push(...page.comments);
      const nextToken = page.continuationToken ?? undefined;
      if (nextToken !== undefined && nextToken === continuationToken) {
        console.error(`[WARNING] Comment paging for work item ${workItemId} repeated its continuation token, stopping`);
        break;
      }
      continuationToken = nextToken;
    } while (continuationToken);

    return comments;
  }

  /**
   * Identity of the PAT owner, as Azure DevOps resolves `@Me`.
   */
  async getAuthenticatedUser(): Promise<AuthenticatedUser> {
    const result = await this.request(ConnectionDataSchema, `${this.config.organizationUrl}/_apis/connectionData`, {
      resource: `Organization '${this.config.organization}'`,
    });
    return result.authenticatedUser;
  }

  private projectUrl(): string {
    return `${this.config.organizationUrl}/${encodeURIComponent(this.config.project)}`;
  }

  private apiVersionFor(pathname: string): string {
    if (pathname.endsWith('/comments')) {
      return COMMENTS_API_VERSION;
    }
    if (pathname.endsWith('/connectionData')) {
      return CONNECTION_DATA_API_VERSION;
    }
    return API_VERSION;
  }

  /**
   * Make an authenticated request and validate the payload.
   * Every failure surfaces as a ProxyError; raw upstream text only reaches the log.
   */
  private async request<S extends z.ZodTypeAny>(
    schema: S,
    baseUrl: string,
    options: RequestOptions
  ): Promise<z.infer<S>> {
    const method = options.method ?? 'GET';
    const url = new URL(baseUrl);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('api-version', this.apiVersionFor(url.pathname));

    if (this.debug) {
      console.error(`[DEBUG] ${method} ${url.pathname}${url.search}`);
    }

    let response: HttpResponse;
    try {
      response = await this.transport({
        url: url.toString(),
        method,
        headers: {
          Authorization: `Basic ${Buffer.from(`:${this.pat}`).toString('base64')}`,
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        timeoutMs: this.config.timeoutMs,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error(`[ERROR] Azure DevOps request failed: ${method} ${url.pathname}: ${this.sanitize(message)}`);
      throw new UpstreamError(error);
    }

    const { statusCode, body } = response;

    if (statusCode === 203 || statusCode === 401) {
      throw new AuthenticationRejectedError(401);
    }
    if (statusCode === 403) {
      throw new AuthenticationRejectedError(403);
    }
    if (statusCode === 404) {
      throw new NotFoundError(options.resource);
    }
    if (statusCode < 200 || statusCode >= 300) {
      console.error(
        `[ERROR] Azure DevOps answered HTTP ${statusCode} for ${method} ${url.pathname}: ${truncate(this.sanitize(body))}`
      );
      throw new UpstreamError();
    }

    let payload: unknown;
    try {
      payload = body ? JSON.parse(body) : {};
    } catch (error) {
      console.error(`[ERROR] Azure DevOps returned a non-JSON body for ${method} ${url.pathname}`);
      throw new UpstreamError(error);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      console.error(
        `[ERROR] Unexpected Azure DevOps payload for ${method} ${url.pathname}: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`
      );
      throw new UpstreamError(parsed.error);
    }

    return parsed.data;
  }

  private sanitize(text: string): string {
    return redactSecret(text, this.pat);
  }
}

export type ClientFactory = (config: AzureDevOpsConfig, pat: string) => AzureDevOpsClient;
