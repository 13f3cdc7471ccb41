/**
 * Sprint Handlers
 * Transport-independent operations behind the HTTP routes and MCP tools.
 * The PAT is an argument of every call and is handed straight to a per-call client.
 */

import { AzureDevOpsClient, ClientFactory } from '../client/azure-devops-client.js';
import { ConfigurationError, ValidationError } from '../errors/index.js';
import {
  AzureDevOpsConfig,
  SprintAggregation,
  SprintListResponse,
  SprintSummaryResponse,
  SprintWorkItemsResponse,
} from '../types/index.js';
import { formatFullResponse, formatSummaryResponse } from './response-formatter.js';
import { resolveSprint, sortSprints, toSprint } from './sprint-resolver.js';
import { aggregateSprintWorkItems } from './work-item-aggregator.js';

export class SprintHandlers {
  constructor(
    private readonly config: AzureDevOpsConfig | null,
    private readonly clientFactory: ClientFactory
  ) {}

  get configured(): boolean {
    return this.config !== null;
  }

  async listSprints(pat: string): Promise<SprintListResponse> {
    const { client } = this.connect(pat);
    const iterations = await client.listIterations();
    const sprints = sortSprints(iterations.map(toSprint));
    return { total: sprints.length, sprints };
  }

  async getSprintWorkItems(pat: string, sprint: string | null | undefined): Promise<SprintWorkItemsResponse> {
    const name = this.requireSprint(sprint);
    return formatFullResponse(name, await this.aggregate(pat, name, true));
  }

  async getSprintSummary(pat: string, sprint: string | null | undefined): Promise<SprintSummaryResponse> {
    const name = this.requireSprint(sprint);
    return formatSummaryResponse(name, await this.aggregate(pat, name, false));
  }

  private async aggregate(pat: string, sprint: string, countOwnership: boolean): Promise<SprintAggregation> {
    const { client, config } = this.connect(pat);
    const iteration = resolveSprint(sprint, await client.listIterations());
    return aggregateSprintWorkItems(client, config, iteration, { countOwnership });
  }

  private requireSprint(sprint: string | null | undefined): string {
    if (sprint === null || sprint === undefined || sprint.trim() === '') {
      throw new ValidationError("Query parameter 'sprint' is required, e.g. sprint=Sprint 37");
    }
    return sprint;
  }

  private connect(pat: string): { client: AzureDevOpsClient; config: AzureDevOpsConfig } {
    if (!this.config) {
      throw new ConfigurationError(
        'Azure DevOps configuration is incomplete, contact the administrator',
        'configuration_incomplete'
      );
    }
    return { client: this.clientFactory(this.config, pat), config: this.config };
  }
}
