import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { QueuedTransport } from './admission.js';
import { createRedactor, type AppConfig } from './config.js';
import { logger } from './logging/index.js';
import { ToolRegistry, registerStatusOperations, registerTrelloOperations } from './operations/index.js';
import { DEFAULT_RETRY_POLICY, RetryController, type RetryControllerOptions, type RetryPolicy } from './retry.js';
import { TrelloClient } from './trello-client.js';
import { AxiosTransport, type Transport } from './transport.js';
import { ValidationService } from './validation.js';

export const SERVER_NAME = 'trello-mcp-server';
export const SERVER_VERSION = '1.0.0';

export interface AppOptions {
  /** Replaces the HTTP transport; tests pass an in-process stub. */
  transport?: Transport;
  retry?: RetryControllerOptions;
}

export interface App {
  server: Server;
  registry: ToolRegistry;
  client: TrelloClient;
  validator: ValidationService;
}

export function retryPolicyFromConfig(config: AppConfig): RetryPolicy {
  return Object.freeze({
    ...DEFAULT_RETRY_POLICY,
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    maxDelayMs: config.retry.maxDelayMs,
  });
}

/** Wires transport, retry, client, validation and tools onto an MCP server. */
export function createApp(config: AppConfig, options: AppOptions = {}): App {
  const redact = createRedactor([config.credentials.apiKey, config.credentials.token]);
  logger.setRedactor(redact);

  const http =
    options.transport ??
    new AxiosTransport({
      baseUrl: config.apiUrl,
      credentials: config.credentials,
      timeoutMs: config.requestTimeoutMs,
      redact,
    });
  const queued = new QueuedTransport(http, {
    concurrency: config.maxConcurrentRequests,
    perWindow: config.rateLimitPerWindow,
  });

  const client = new TrelloClient(new RetryController(queued, options.retry), retryPolicyFromConfig(config));
  const validator = new ValidationService(client);

  const registry = new ToolRegistry();
  registerTrelloOperations(registry, { client, validator });
  registerStatusOperations(registry, {
    config,
    version: SERVER_VERSION,
    queueStatus: () => queued.getQueueStatus(),
  });

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
    }
  );

  logger.getMCPLogger().setServer(server);

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: registry.list() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    return registry.dispatch(name, args ?? {}, { signal: extra.signal });
  });

  return { server, registry, client, validator };
}
