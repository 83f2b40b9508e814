import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';
import { createApp } from '../server.js';
import type { TransportResult } from '../transport.js';
import {
  BOARD_ID,
  ME_ID,
  WORKSPACE_ID,
  StubTransport,
  errorOf,
  instantSleep,
  respond,
  routeTable,
} from './helpers.js';

const config = loadConfig({ TRELLO_API_KEY: 'test-key', TRELLO_TOKEN: 'test-secret' });

function appWith(table: Record<string, TransportResult>) {
  const transport = new StubTransport(routeTable(table));
  const app = createApp(config, { transport, retry: { sleep: instantSleep } });
  return { transport, registry: app.registry };
}

function templateInWorkspace(memberType: string): Record<string, TransportResult> {
  return {
    [`GET /boards/${BOARD_ID}`]: respond(200, { id: BOARD_ID }),
    [`GET /organizations/${WORKSPACE_ID}`]: respond(200, { id: WORKSPACE_ID }),
    'GET /members/me': respond(200, { id: ME_ID }),
    [`GET /organizations/${WORKSPACE_ID}/memberships`]: respond(200, [{ idMember: ME_ID, memberType }]),
    'POST /boards': respond(200, { id: 'new-board' }),
  };
}

describe('trello_export_board', () => {
  it('reads the board with everything nested', async () => {
    const { transport, registry } = appWith({ [`GET /boards/${BOARD_ID}`]: respond(200, { id: BOARD_ID }) });

    await registry.dispatch('trello_export_board', { board_id: BOARD_ID });

    expect(transport.calls[0].query).toEqual({
      fields: 'all',
      actions: 'all',
      action_fields: 'all',
      actions_limit: '1000',
      cards: 'all',
      card_fields: 'all',
      card_attachments: 'true',
      labels: 'all',
      lists: 'all',
      list_fields: 'all',
      members: 'all',
      member_fields: 'all',
      checklists: 'all',
      checklist_fields: 'all',
      customFields: 'true',
    });
  });
});

describe('trello_create_board_from_template', () => {
  it('copies the template into a workspace the caller belongs to', async () => {
    const { transport, registry } = appWith(templateInWorkspace('normal'));

    await registry.dispatch('trello_create_board_from_template', {
      template_board_id: BOARD_ID,
      name: 'Q3 Sprint',
      id_organization: WORKSPACE_ID,
      keep_cards: true,
      permission_level: 'org',
    });

    expect(transport.routes()).toEqual([
      `GET /boards/${BOARD_ID}`,
      `GET /organizations/${WORKSPACE_ID}`,
      'GET /members/me',
      `GET /organizations/${WORKSPACE_ID}/memberships`,
      'POST /boards',
    ]);
    expect(transport.calls[4].body).toEqual({
      name: 'Q3 Sprint',
      idBoardSource: BOARD_ID,
      keepFromSource: 'cards',
      idOrganization: WORKSPACE_ID,
      prefs_permissionLevel: 'org',
    });
  });

  it('refuses a workspace observer', async () => {
    const { transport, registry } = appWith(templateInWorkspace('observer'));

    const response = await registry.dispatch('trello_create_board_from_template', {
      template_board_id: BOARD_ID,
      name: 'Q3 Sprint',
      id_organization: WORKSPACE_ID,
    });

    expect(transport.routes()).not.toContain('POST /boards');
    expect(errorOf(response).message).toBe(
      `Permission denied for Workspace '${WORKSPACE_ID}': normal access required (current role: observer).`
    );
  });

  it('creates a private board without a workspace check', async () => {
    const { transport, registry } = appWith(templateInWorkspace('observer'));

    await registry.dispatch('trello_create_board_from_template', { template_board_id: BOARD_ID, name: 'Copy' });

    expect(transport.routes()).toEqual([`GET /boards/${BOARD_ID}`, 'POST /boards']);
    expect(transport.calls[1].body).toEqual({
      name: 'Copy',
      idBoardSource: BOARD_ID,
      keepFromSource: 'none',
      prefs_permissionLevel: 'private',
    });
  });
});

describe('trello_search_members', () => {
  it('searches with the default limit', async () => {
    const { transport, registry } = appWith({ 'GET /search/members': respond(200, []) });

    await registry.dispatch('trello_search_members', { query: 'ada', board_id: BOARD_ID });

    expect(transport.calls[0].query).toEqual({ query: 'ada', limit: '8', idBoard: BOARD_ID });
  });

  it('caps the limit at 20', async () => {
    const { transport, registry } = appWith({});

    const response = await registry.dispatch('trello_search_members', { query: 'ada', limit: 25 });

    expect(transport.calls).toHaveLength(0);
    expect(errorOf(response).message).toBe('limit must be at most 20');
  });
});
