import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type {
  HttpResponse,
  RequestDescriptor,
  Transport,
  TransportFailure,
  TransportResult,
} from '../transport.js';

export const BOARD_ID = '5f1a2b3c4d5e6f7a8b9c0d1e';
export const LIST_ID = '6a1b2c3d4e5f6a7b8c9d0e1f';
export const CARD_ID = '7b2c3d4e5f6a7b8c9d0e1f2a';
export const WORKSPACE_ID = '8c3d4e5f6a7b8c9d0e1f2a3b';
export const ME_ID = '9d4e5f6a7b8c9d0e1f2a3b4c';

export function respond(status: number, body?: unknown, headers: Record<string, string> = {}): HttpResponse {
  return { type: 'response', status, headers, body };
}

export function networkFailure(code = 'ECONNRESET'): TransportFailure {
  return { type: 'failure', code, message: 'socket hang up', timedOut: false, cancelled: false };
}

type Handler = (descriptor: RequestDescriptor) => TransportResult;

/** In-process transport that records every descriptor it receives. */
export class StubTransport implements Transport {
  readonly calls: RequestDescriptor[] = [];

  constructor(private readonly handler: Handler) {}

  async send(descriptor: RequestDescriptor): Promise<TransportResult> {
    this.calls.push(descriptor);
    return this.handler(descriptor);
  }

  routes(): string[] {
    return this.calls.map((call) => `${call.method} ${call.path}`);
  }
}

/** Responds by "METHOD /path"; unknown routes get a 404. */
export function routeTable(table: Record<string, TransportResult>): Handler {
  return (descriptor) => table[`${descriptor.method} ${descriptor.path}`] ?? respond(404, 'The requested resource was not found.');
}

export const instantSleep = async (): Promise<boolean> => true;

/** Parses the JSON text of a tool result. */
export function payloadOf(response: CallToolResult): Record<string, unknown> {
  const first = response.content[0];
  if (!first || first.type !== 'text') {
    throw new Error('Expected a text tool result');
  }
  return JSON.parse(first.text);
}

export function errorOf(response: CallToolResult): Record<string, unknown> {
  const payload = payloadOf(response);
  const error = payload.error;
  if (typeof error !== 'object' || error === null) {
    throw new Error('Expected an error payload');
  }
  return { ...error };
}
