/**
 * Integration test for the packaged entry point.
 * Starts `src/index.ts` the way `npm start` does (tsx loader) and talks to it
 * over stdio with the MCP SDK client.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { resolve, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { getStrippedEnv } from '../../src/config.js';
import { createTestDirs, type TestDirs } from '../helpers.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PACKAGE_ROOT = resolve(__dirname, '../..');

let dirs: TestDirs;
let client: Client;

beforeAll(async () => {
  dirs = await createTestDirs();
  const transport = new StdioClientTransport({
    command: process.execPath,
    args: ['--import', 'tsx', 'src/index.ts'],
    cwd: PACKAGE_ROOT,
    env: {
      ...getStrippedEnv(),
      // No key needed; nothing here calls the model
      FORGE_LLM_PROVIDER: 'ollama',
      FORGE_SANDBOX_DIR: join(dirs.root, 'sandbox'),
      FORGE_LOG_DIR: join(dirs.root, 'logs'),
      FORGE_LIBRARY_DIR: join(dirs.root, 'apps'),
      LOG_LEVEL: 'error',
    },
    stderr: 'ignore',
  });

  client = new Client({ name: 'forge-entry-test', version: '1.0.0' });
  await client.connect(transport);
}, 30_000);

afterAll(async () => {
  await client.close();
  await dirs.cleanup();
});

describe('stdio entry point', () => {
  it('should start under tsx and list its tools', async () => {
    const { tools } = await client.listTools();

    expect(tools).toHaveLength(12);
    expect(tools.map((t) => t.name)).toContain('execute_code');
  });

  it('should answer a tool call that needs no model', async () => {
    const result = await client.callTool({ name: 'list_services', arguments: {} });

    expect(result.isError).toBeFalsy();
    expect(result.content).toEqual([{ type: 'text', text: '{"success":true,"data":{"services":[]}}' }]);
  });
});
