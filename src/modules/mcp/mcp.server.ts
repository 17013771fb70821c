/**
 * MCP Server
 * Low-level SDK server exposing the generate_sfx tool over stdio
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '@/shared/utils';
import { SERVER_INFO, SERVER_INSTRUCTIONS } from './config/tool.config';
import type { ToolHandler } from './handlers/tool.handler';

export function createMcpServer(toolHandler: ToolHandler): Server {
  const server = new Server(
    { ...SERVER_INFO },
    {
      capabilities: { tools: {} },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolHandler.getTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    toolHandler.handleToolCall(request.params.name, request.params.arguments)
  );

  return server;
}

/**
 * Connect the server to stdin/stdout
 */
export async function startStdioServer(server: Server): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('SFX MCP server listening on stdio', { ...SERVER_INFO });
}
