/**
 * Forge MCP Server — Entry Point
 *
 * Stdio transport.
 */

import { mkdir } from 'node:fs/promises';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Logger } from '@appforge/shared/Utils/logger.js';
import { loadEnvSafely } from '@appforge/shared/Utils/env.js';
import { createServer } from './server.js';
import { getConfig } from './config.js';
import { createLanguageModel, validateProviderConfig } from './llm/factory.js';
import { AiTextGenerator, generatorOptionsFromConfig } from './llm/text-generator.js';

// Before getConfig(): config is read from process.env. src/ → package root
loadEnvSafely(import.meta.url, 1);

const logger = new Logger('forge');

async function main() {
  const config = getConfig();
  validateProviderConfig(config);

  await mkdir(config.sandboxDir, { recursive: true });
  await mkdir(config.logDir, { recursive: true });
  await mkdir(config.libraryDir, { recursive: true });

  logger.info('Starting Forge MCP', { transport: 'stdio' });
  logger.info(`Sandbox: ${config.sandboxDir}`);
  logger.info(`Logs: ${config.logDir}`);
  logger.info(`Library: ${config.libraryDir}`);

  const generator = new AiTextGenerator(createLanguageModel(config), generatorOptionsFromConfig(config));
  const { server, components } = createServer(config, generator);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  // Graceful shutdown: stop every service and destroy its environment
  const shutdown = async () => {
    await components.services.shutdownAll();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  logger.info('Forge MCP running on stdio');
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
