/**
 * MCP server over Streamable HTTP, stateless mode.
 * Every POST gets its own Server and transport; nothing survives the request.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { AuthenticationMissingError } from './errors/index.js';
import { TOOL_DEFINITIONS, ToolHandlers } from './handlers/tool-handlers.js';

export const SERVER_NAME = 'sprint-workitems-proxy';
export const SERVER_VERSION = '2.0.0';

export function createMCPServer(toolHandlers: ToolHandlers): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const pat = extra.authInfo?.token;
    if (!pat) {
      const error = new AuthenticationMissingError();
      return {
        content: [{ type: 'text', text: JSON.stringify(error.toResponseBody(), null, 2) }],
        isError: true,
      };
    }
    return toolHandlers.handleToolCall(request.params.name, request.params.arguments, pat);
  });

  return server;
}

/**
 * Serve one MCP POST for the caller identified by `pat`.
 */
export async function handleMcpRequest(
  toolHandlers: ToolHandlers,
  pat: string,
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown
): Promise<void> {
  const server = createMCPServer(toolHandlers);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

  res.on('close', () => {
    transport.close().catch((error: unknown) => {
      console.error('[WARNING] Failed to close MCP transport:', error instanceof Error ? error.message : error);
    });
    server.close().catch((error: unknown) => {
      console.error('[WARNING] Failed to close MCP server:', error instanceof Error ? error.message : error);
    });
  });

  const auth: AuthInfo = { token: pat, clientId: 'bearer', scopes: [] };
  await server.connect(transport);
  await transport.handleRequest(Object.assign(req, { auth }), res, body);
}
