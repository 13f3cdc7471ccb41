/**
 * Tool Handlers for the MCP surface
 * Exposes the sprint operations as MCP tools; the caller's PAT arrives with each call.
 */

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ValidationError, toProxyError } from '../errors/index.js';
import { redactSecret } from '../utils/text.js';
import { SprintHandlers } from './sprint-handlers.js';

const SprintArgsSchema = z.object({
  sprint: z.string({ required_error: "'sprint' is required" }),
});

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: 'list-sprints',
    description: 'List the sprints (iterations) of the configured team, current first',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
  {
    name: 'get-sprint-work-items',
    description: 'Get the full work items in a sprint that you created or are assigned to, with comments',
    inputSchema: {
      type: 'object',
      properties: {
        sprint: {
          type: 'string',
          description: "Sprint name exactly as shown in Azure DevOps, e.g. 'Sprint 37'",
        },
      },
      required: ['sprint'],
    },
  },
  {
    name: 'get-sprint-summary',
    description: 'Get title, description and comment texts of your work items in a sprint',
    inputSchema: {
      type: 'object',
      properties: {
        sprint: {
          type: 'string',
          description: "Sprint name exactly as shown in Azure DevOps, e.g. 'Sprint 37'",
        },
      },
      required: ['sprint'],
    },
  },
];

export class ToolHandlers {
  constructor(private readonly sprintHandlers: SprintHandlers) {}

  /**
   * Dispatch a tool call for the caller identified by `pat`.
   * Failures become `isError` results; the PAT is redacted from everything returned.
   */
  async handleToolCall(name: string, args: Record<string, unknown> | undefined, pat: string): Promise<CallToolResult> {
    try {
      let result: unknown;
      switch (name) {
        case 'list-sprints':
          result = await this.sprintHandlers.listSprints(pat);
          break;
        case 'get-sprint-work-items':
          result = await this.sprintHandlers.getSprintWorkItems(pat, this.parseSprint(args));
          break;
        case 'get-sprint-summary':
          result = await this.sprintHandlers.getSprintSummary(pat, this.parseSprint(args));
          break;
        default:
          throw new ValidationError(`Unknown tool: ${name}`);
      }

      return this.sanitizeResponse(
        {
          content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
        },
        pat
      );
    } catch (error) {
      const proxyError = toProxyError(error);
      // Sanitize tool name to prevent log injection
      const sanitizedName = name.replace(/[\r\n\t]/g, '_');
      console.error(`[ERROR] Tool ${sanitizedName} failed: ${redactSecret(proxyError.message, pat)}`);
      return this.sanitizeResponse(
        {
          content: [{ type: 'text', text: JSON.stringify(proxyError.toResponseBody(), null, 2) }],
          isError: true,
        },
        pat
      );
    }
  }

  private parseSprint(args: Record<string, unknown> | undefined): string {
    const parsed = SprintArgsSchema.safeParse(args ?? {});
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    return parsed.data.sprint;
  }

  private sanitizeResponse(response: CallToolResult, pat: string): CallToolResult {
    return {
      ...response,
      content: response.content.map((item) =>
        item.type === 'text' ? { ...item, text: redactSecret(item.text, pat) } : item
      ),
    };
  }
}
