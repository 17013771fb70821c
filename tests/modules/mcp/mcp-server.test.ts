/**
 * MCP Server Tests
 * Full request/response round trips over a linked in-memory transport
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createMcpServer } from '@/modules/mcp/mcp.server';
import { ToolHandler } from '@/modules/mcp/handlers/tool.handler';
import { RateLimitError } from '@/modules/sfx/errors';

describe('MCP Server', () => {
  const generateSoundEffect = vi.fn();
  const save = vi.fn();
  const validateOptions = vi.fn();

  let server: Server;
  let client: Client;

  beforeEach(async () => {
    generateSoundEffect.mockReset().mockResolvedValue(Buffer.from('audio'));
    save.mockReset().mockResolvedValue('/tmp/sfx/sfx_test.mp3');

    server = createMcpServer(new ToolHandler({ generateSoundEffect }, { save, validateOptions }));
    client = new Client({ name: 'sfx-test-client', version: '0.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('should advertise its name and instructions', () => {
    expect(client.getServerVersion()).toEqual({ name: 'sfx-mcp', version: '0.1.0' });
    expect(client.getInstructions()).toBe('MCP Server for generating sound effects using the ElevenLabs API.');
  });

  it('should list generate_sfx', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(['generate_sfx']);
  });

  it('should return the saved file path as text content', async () => {
    const result = await client.callTool({
      name: 'generate_sfx',
      arguments: { text: 'Cat meow', duration_seconds: 1 },
    });

    expect(result.content).toEqual([{ type: 'text', text: '/tmp/sfx/sfx_test.mp3' }]);
    expect(generateSoundEffect).toHaveBeenCalledWith('Cat meow', {
      durationSeconds: 1,
      promptInfluence: undefined,
    });
  });

  it('should answer an unknown tool with MethodNotFound', async () => {
    const error = await client.callTool({ name: 'nope', arguments: {} }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(McpError);
    expect(error).toMatchObject({ code: ErrorCode.MethodNotFound });
  });

  it('should answer a missing text with InvalidParams', async () => {
    const error = await client
      .callTool({ name: 'generate_sfx', arguments: {} })
      .catch((caught: unknown) => caught);

    expect(error).toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it('should answer an exhausted rate limit with InternalError', async () => {
    generateSoundEffect.mockRejectedValue(new RateLimitError('Rate limit exceeded after 4 attempts: slow down'));

    const error = await client
      .callTool({ name: 'generate_sfx', arguments: { text: 'Cat meow' } })
      .catch((caught: unknown) => caught);

    expect(error).toMatchObject({ code: ErrorCode.InternalError });
    expect(save).not.toHaveBeenCalled();
  });
});
