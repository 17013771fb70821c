/**
 * MCP Module Exports
 */

export { createMcpServer, startStdioServer } from './mcp.server';
export { ToolHandler, toMcpError } from './handlers/tool.handler';
export { generateSfxTool, GENERATE_SFX_TOOL_NAME, SERVER_INFO } from './config/tool.config';
