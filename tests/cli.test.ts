/**
 * sfx-mcp Command Tests
 * Starts the real command as a child process and speaks MCP over its stdio
 */

import { describe, it, expect, afterEach } from 'vitest';
import { createRequire } from 'module';
import os from 'os';
import { fileURLToPath } from 'url';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';

const CLI_PATH = fileURLToPath(new URL('../src/cli.ts', import.meta.url));
const TSX_CLI = createRequire(import.meta.url).resolve('tsx/cli');

describe('sfx-mcp command', () => {
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    client = undefined;
  });

  it('should serve tools/list when started outside the project root', async () => {
    const transport = new StdioClientTransport({
      command: process.execPath,
      args: [TSX_CLI, CLI_PATH],
      cwd: os.tmpdir(),
      env: {
        ...getDefaultEnvironment(),
        ELEVENLABS_API_KEY: 'test-secret',
        LOG_LEVEL: 'error',
        SFX_TEMP_DIR: os.tmpdir(),
      },
    });
    client = new Client({ name: 'sfx-cli-test', version: '0.0.0' });

    await client.connect(transport);
    const { tools } = await client.listTools();

    expect(client.getServerVersion()).toEqual({ name: 'sfx-mcp', version: '0.1.0' });
    expect(tools.map((tool) => tool.name)).toEqual(['generate_sfx']);
  }, 30000);
});
