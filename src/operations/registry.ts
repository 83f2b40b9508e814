import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { CallToolResult, Tool, ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import { toErrorPayload, validationError, type ClassifiedError, type Result } from '../errors.js';
import { logger } from '../logging/index.js';
import { truncateResponse } from '../utils.js';
import type { TrelloClient } from '../trello-client.js';
import type { ValidationService } from '../validation.js';

export type ToolResponse = CallToolResult;

export interface CallContext {
  signal?: AbortSignal;
}

export interface OperationContext {
  client: TrelloClient;
  validator: ValidationService;
}

export type ArgsSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ToolDefinition<T> {
  name: string;
  description: string;
  schema: ArgsSchema<T>;
  annotations: ToolAnnotations;
  handler: (args: T, call: CallContext) => Promise<Result<unknown>>;
}

interface RegisteredTool {
  tool: Tool;
  invoke: (rawArgs: unknown, call: CallContext) => Promise<ToolResponse>;
}

// ============================================
// ANNOTATIONS
// ============================================

export const READ_ONLY: ToolAnnotations = { readOnlyHint: true, openWorldHint: true };
export const CREATES: ToolAnnotations = { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: true };
export const UPDATES: ToolAnnotations = { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: true };
export const DESTRUCTIVE: ToolAnnotations = { readOnlyHint: false, destructiveHint: true, idempotentHint: false, openWorldHint: true };
export const LOCAL: ToolAnnotations = { readOnlyHint: false, openWorldHint: false };

// ============================================
// RESPONSES
// ============================================

export function toolSuccess(data: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: truncateResponse(JSON.stringify(data ?? null, null, 2)) }],
  };
}

export function toolError(error: ClassifiedError): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify({ error: toErrorPayload(error) }, null, 2) }],
    isError: true,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toInputSchema(schema: z.ZodTypeAny): Tool['inputSchema'] {
  const json = zodToJsonSchema(schema, { $refStrategy: 'none' });
  const properties = 'properties' in json && isRecord(json.properties) ? json.properties : {};
  const required =
    'required' in json && Array.isArray(json.required)
      ? json.required.filter((name): name is string => typeof name === 'string')
      : [];
  return required.length > 0 ? { type: 'object', properties, required } : { type: 'object', properties };
}

// ============================================
// REGISTRY
// ============================================

export class ToolRegistry {
  private readonly entries = new Map<string, RegisteredTool>();

  register<T>(definition: ToolDefinition<T>): void {
    if (this.entries.has(definition.name)) {
      throw new Error(`Tool already registered: ${definition.name}`);
    }

    const tool: Tool = {
      name: definition.name,
      description: definition.description,
      inputSchema: toInputSchema(definition.schema),
      annotations: definition.annotations,
    };

    const invoke = async (rawArgs: unknown, call: CallContext): Promise<ToolResponse> => {
      const parsed = definition.schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const violations = parsed.error.errors.map((issue) => ({
          field: issue.path.join('.') || '(arguments)',
          message: issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        }));
        return toolError(validationError(violations));
      }

      const startTime = Date.now();
      let result: Result<unknown>;
      try {
        result = await definition.handler(parsed.data, call);
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error('Tool handler failed', { tool: definition.name, message }, 'dispatch');
        result = { ok: false, error: { kind: 'Unknown', message: `Internal error in ${definition.name}: ${message}`, body: '' } };
      }

      logger.recordMetric({
        tool: definition.name,
        latency_ms: Date.now() - startTime,
        success: result.ok,
        timestamp: new Date().toISOString(),
        ...(result.ok ? {} : { error: result.error.kind }),
      });

      if (!result.ok) {
        logger.warning('Tool call failed', {
          tool: definition.name,
          kind: result.error.kind,
          message: result.error.message,
        }, 'dispatch');
        return toolError(result.error);
      }

      return toolSuccess(result.value);
    };

    this.entries.set(definition.name, { tool, invoke });
  }

  list(): Tool[] {
    return [...this.entries.values()].map((entry) => entry.tool);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get size(): number {
    return this.entries.size;
  }

  async dispatch(name: string, rawArgs: unknown, call: CallContext = {}): Promise<ToolResponse> {
    const entry = this.entries.get(name);
    if (!entry) {
      return toolError({ kind: 'BadRequest', message: `Unknown tool: ${name}` });
    }
    logger.debug('Tool call', { tool: name }, 'dispatch');
    return entry.invoke(rawArgs, call);
  }
}
