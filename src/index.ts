#!/usr/bin/env node

import dotenv from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { logger } from './logging/index.js';
import { createApp, SERVER_VERSION } from './server.js';

// stdout must carry JSON-RPC only
process.env.DOTENV_CONFIG_QUIET = '1';
dotenv.config();

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error('❌ Invalid environment configuration:');
      console.error(error.issues.join('\n'));
      console.error('\n💡 Please check your .env file and ensure all required variables are set correctly.');
      console.error('   Required: TRELLO_API_KEY, TRELLO_TOKEN');
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit();
  const { server, registry } = createApp(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('Trello MCP Server started', {
    version: SERVER_VERSION,
    tools: registry.size,
    logging_enabled: logger.getConfig().enabled,
  }, 'main');
  console.error(`Trello MCP Server v${SERVER_VERSION} running on stdio`);
  console.error(`- Tools: ${registry.size} available`);
  console.error(`- Retries: up to ${config.retry.maxAttempts} attempts for rate limits and network errors`);
  console.error('- Logging: Runtime control available via trello_set_log_level');
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
