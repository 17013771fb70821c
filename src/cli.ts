#!/usr/bin/env tsx
/**
 * sfx-mcp command
 * Runs the server entry under tsx with this package's tsconfig, so the `@/`
 * alias resolves from any working directory. Only relative imports here.
 */

import { spawn } from 'child_process';
import { createRequire } from 'module';
import path from 'path';
import { fileURLToPath } from 'url';
import { logger } from './shared/utils/logger';

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const TSCONFIG_PATH = path.join(PACKAGE_ROOT, 'tsconfig.json');
const ENTRY_PATH = path.join(PACKAGE_ROOT, 'src', 'index.ts');

const tsxCli = createRequire(import.meta.url).resolve('tsx/cli');

// stdio is inherited: the MCP frames flow straight between host and server
const server = spawn(process.execPath, [tsxCli, '--tsconfig', TSCONFIG_PATH, ENTRY_PATH], {
  stdio: 'inherit',
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    server.kill(signal);
  });
}

server.on('error', (error: Error) => {
  logger.error('Failed to launch SFX MCP server', error);
  process.exit(1);
});

server.on('exit', (code: number | null) => {
  process.exit(code ?? 1);
});
