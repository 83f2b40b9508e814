import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';
import { createApp } from '../server.js';
import type { TransportResult } from '../transport.js';
import {
  BOARD_ID,
  CARD_ID,
  LIST_ID,
  ME_ID,
  WORKSPACE_ID,
  StubTransport,
  errorOf,
  instantSleep,
  networkFailure,
  payloadOf,
  respond,
  routeTable,
} from './helpers.js';

const config = loadConfig({ TRELLO_API_KEY: 'test-key', TRELLO_TOKEN: 'test-secret' });

function appWith(table: Record<string, TransportResult>) {
  const transport = new StubTransport(routeTable(table));
  const app = createApp(config, { transport, retry: { sleep: instantSleep } });
  return { transport, registry: app.registry };
}

function boardWithRole(memberType: string): Record<string, TransportResult> {
  return {
    [`GET /boards/${BOARD_ID}`]: respond(200, { id: BOARD_ID }),
    'GET /members/me': respond(200, { id: ME_ID }),
    [`GET /boards/${BOARD_ID}/memberships`]: respond(200, [{ idMember: ME_ID, memberType }]),
    [`DELETE /boards/${BOARD_ID}`]: respond(200, { _value: null }),
  };
}

describe('trello_delete_board', () => {
  it('refuses to delete without admin membership', async () => {
    const { transport, registry } = appWith(boardWithRole('normal'));

    const response = await registry.dispatch('trello_delete_board', { board_id: BOARD_ID });

    expect(response.isError).toBe(true);
    expect(transport.routes()).toEqual([
      `GET /boards/${BOARD_ID}`,
      'GET /members/me',
      `GET /boards/${BOARD_ID}/memberships`,
    ]);
    expect(errorOf(response)).toEqual({
      kind: 'Forbidden',
      message: `Permission denied for Board '${BOARD_ID}': admin access required (current role: normal).`,
      resource_kind: 'board',
      resource_id: BOARD_ID,
      status: 403,
      required_level: 'admin',
      hint: 'This operation requires admin membership',
    });
  });

  it('deletes the board for an admin', async () => {
    const { transport, registry } = appWith(boardWithRole('admin'));

    const response = await registry.dispatch('trello_delete_board', { board_id: BOARD_ID });

    expect(response.isError).toBeUndefined();
    expect(transport.routes()).toContain(`DELETE /boards/${BOARD_ID}`);
    expect(payloadOf(response)).toEqual({
      success: true,
      message: `Board ${BOARD_ID} has been permanently deleted`,
    });
  });

  it('reports a missing board before checking permissions', async () => {
    const { transport, registry } = appWith({});

    const response = await registry.dispatch('trello_delete_board', { board_id: BOARD_ID });

    expect(transport.calls).toHaveLength(1);
    expect(errorOf(response).kind).toBe('NotFound');
  });

  it('rejects missing arguments without a request', async () => {
    const { transport, registry } = appWith({});

    const response = await registry.dispatch('trello_delete_board', {});

    expect(transport.calls).toHaveLength(0);
    expect(errorOf(response)).toEqual({
      kind: 'Validation',
      message: 'board_id: Required',
      violations: [{ field: 'board_id', message: 'board_id: Required' }],
      hint: 'Fix the listed fields and try again',
    });
  });
});

function workspaceWithRole(ref: string, memberType: string): Record<string, TransportResult> {
  return {
    [`GET /organizations/${ref}`]: respond(200, { id: WORKSPACE_ID }),
    'GET /members/me': respond(200, { id: ME_ID }),
    [`GET /organizations/${ref}/memberships`]: respond(200, [{ idMember: ME_ID, memberType }]),
    [`PUT /organizations/${ref}`]: respond(200, { id: WORKSPACE_ID, displayName: 'Platform' }),
    [`DELETE /organizations/${ref}`]: respond(200, { _value: null }),
  };
}

describe('trello_delete_workspace', () => {
  it('refuses to delete without admin membership', async () => {
    const { transport, registry } = appWith(workspaceWithRole(WORKSPACE_ID, 'normal'));

    const response = await registry.dispatch('trello_delete_workspace', { workspace_id: WORKSPACE_ID });

    expect(transport.routes()).toEqual([
      `GET /organizations/${WORKSPACE_ID}`,
      'GET /members/me',
      `GET /organizations/${WORKSPACE_ID}/memberships`,
    ]);
    expect(errorOf(response)).toEqual({
      kind: 'Forbidden',
      message: `Permission denied for Workspace '${WORKSPACE_ID}': admin access required (current role: normal).`,
      resource_kind: 'workspace',
      resource_id: WORKSPACE_ID,
      status: 403,
      required_level: 'admin',
      hint: 'This operation requires admin membership',
    });
  });

  it('deletes a workspace addressed by short name for an admin', async () => {
    const { transport, registry } = appWith(workspaceWithRole('eng_team', 'admin'));

    const response = await registry.dispatch('trello_delete_workspace', { workspace_id: 'eng_team' });

    expect(transport.routes()).toEqual([
      'GET /organizations/eng_team',
      'GET /members/me',
      'GET /organizations/eng_team/memberships',
      'DELETE /organizations/eng_team',
    ]);
    expect(payloadOf(response)).toEqual({ success: true, message: 'Workspace eng_team has been deleted' });
  });

  it('rejects a malformed workspace reference without a request', async () => {
    const { transport, registry } = appWith({});

    const response = await registry.dispatch('trello_delete_workspace', { workspace_id: 'Eng Team' });

    expect(transport.calls).toHaveLength(0);
    expect(errorOf(response).message).toBe("Invalid workspace_id 'Eng Team'. Expected a workspace ID or short name");
  });
});

describe('trello_update_workspace', () => {
  it('refuses to update without admin membership', async () => {
    const { transport, registry } = appWith(workspaceWithRole('eng_team', 'normal'));

    const response = await registry.dispatch('trello_update_workspace', {
      workspace_id: 'eng_team',
      display_name: 'Platform',
    });

    expect(transport.routes()).not.toContain('PUT /organizations/eng_team');
    expect(errorOf(response).kind).toBe('Forbidden');
  });

  it('updates the workspace for an admin', async () => {
    const { transport, registry } = appWith(workspaceWithRole('eng_team', 'admin'));

    await registry.dispatch('trello_update_workspace', { workspace_id: 'eng_team', display_name: 'Platform' });

    const put = transport.calls.find((call) => call.method === 'PUT');
    expect(put?.path).toBe('/organizations/eng_team');
    expect(put?.body).toEqual({ displayName: 'Platform' });
  });
});

describe('trello_create_workspace', () => {
  it('rejects an empty display name without a request', async () => {
    const { transport, registry } = appWith({});

    const response = await registry.dispatch('trello_create_workspace', { display_name: '' });

    expect(transport.calls).toHaveLength(0);
    expect(errorOf(response).message).toBe('display_name must be between 1 and 16384 characters');
  });

  it('posts only the fields that were given', async () => {
    const { transport, registry } = appWith({
      'POST /organizations': respond(200, { id: WORKSPACE_ID, displayName: 'Engineering' }),
    });

    const response = await registry.dispatch('trello_create_workspace', {
      display_name: 'Engineering',
      name: 'eng_team',
    });

    expect(transport.calls).toHaveLength(1);
    expect(transport.calls[0].body).toEqual({ displayName: 'Engineering', name: 'eng_team' });
    expect(payloadOf(response)).toEqual({ id: WORKSPACE_ID, displayName: 'Engineering' });
  });
});

describe('trello_create_card', () => {
  const listExists = { [`GET /lists/${LIST_ID}`]: respond(200, { id: LIST_ID }) };

  it('retries a rate-limited create', async () => {
    const { transport, registry } = appWith({
      ...listExists,
      'POST /cards': respond(429, 'API_TOKEN_LIMIT_EXCEEDED', { 'retry-after': '1' }),
    });

    const response = await registry.dispatch('trello_create_card', { list_id: LIST_ID, name: 'Write docs' });

    expect(transport.routes().filter((route) => route === 'POST /cards')).toHaveLength(3);
    expect(errorOf(response)).toEqual({
      kind: 'RateLimit',
      message: `Rate limit exceeded while accessing List '${LIST_ID}'. Retry after 1 seconds.`,
      resource_kind: 'list',
      resource_id: LIST_ID,
      status: 429,
      retry_after_seconds: 1,
      hint: 'Wait before retrying or reduce the request rate',
    });
  });

  it('does not repeat a create after a network failure', async () => {
    const { transport, registry } = appWith({ ...listExists, 'POST /cards': networkFailure() });

    const response = await registry.dispatch('trello_create_card', { list_id: LIST_ID, name: 'Write docs' });

    expect(transport.routes()).toEqual([`GET /lists/${LIST_ID}`, 'POST /cards']);
    expect(errorOf(response)).toEqual({
      kind: 'Network',
      message: `Network error while accessing List '${LIST_ID}': socket hang up (ECONNRESET)`,
      resource_kind: 'list',
      resource_id: LIST_ID,
      code: 'ECONNRESET',
      timed_out: false,
      cancelled: false,
      hint: 'Check your network connection and TRELLO_API_URL',
    });
  });

  it('creates the card in an existing list', async () => {
    const { transport, registry } = appWith({
      ...listExists,
      'POST /cards': respond(200, { id: CARD_ID, name: 'Write docs' }),
    });

    const response = await registry.dispatch('trello_create_card', { list_id: LIST_ID, name: 'Write docs' });

    expect(transport.calls[1].body).toEqual({ idList: LIST_ID, name: 'Write docs' });
    expect(payloadOf(response)).toEqual({ id: CARD_ID, name: 'Write docs' });
  });
});

describe('tool registry', () => {
  it('reports unknown tools', async () => {
    const { registry } = appWith({});

    const response = await registry.dispatch('trello_make_coffee', {});

    expect(response.isError).toBe(true);
    expect(errorOf(response)).toEqual({
      kind: 'BadRequest',
      message: 'Unknown tool: trello_make_coffee',
      hint: 'Check the request parameters for correctness',
    });
  });

  it('lists tools with required fields and annotations', () => {
    const { registry } = appWith({});
    const tool = registry.list().find((entry) => entry.name === 'trello_delete_board');

    expect(tool?.inputSchema.required).toEqual(['board_id']);
    expect(tool?.annotations?.destructiveHint).toBe(true);
    expect(registry.has('trello_get_status')).toBe(true);
  });
});
