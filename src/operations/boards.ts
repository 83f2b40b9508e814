import { mapResult } from '../errors.js';
import { rules } from '../rules.js';
import { runPreflight, type PreflightCheck } from '../validation.js';
import { fieldList } from '../utils.js';
import {
  BoardIdSchema,
  CreateBoardLabelSchema,
  CreateBoardSchema,
  GetBoardActionsSchema,
  GetBoardSchema,
  ListBoardsSchema,
  UpdateBoardSchema,
} from '../schemas.js';
import { CREATES, DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

const BOARD_FIELDS = ['name', 'desc', 'closed', 'url', 'idOrganization', 'dateLastActivity'];

export function registerBoardOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_get_boards',
    description: 'List the boards of the authenticated member',
    schema: ListBoardsSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.listBoards);
      if (!gate.ok) return gate;

      return client.get('/members/me/boards', {
        query: { filter: args.filter ?? 'open', fields: fieldList(args.fields, BOARD_FIELDS) },
        resource: { kind: 'member', id: 'me' },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_board',
    description: 'Get a board by ID, optionally with its open lists',
    schema: GetBoardSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.boardId);
      if (!gate.ok) return gate;

      return client.get(`/boards/${args.board_id}`, {
        query: {
          fields: fieldList(args.fields, BOARD_FIELDS),
          lists: args.include_lists ? 'open' : undefined,
        },
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_board_labels',
    description: 'List the labels defined on a board',
    schema: BoardIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.boardId);
      if (!gate.ok) return gate;

      return client.get(`/boards/${args.board_id}/labels`, {
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_board_actions',
    description: 'Get the recent activity of a board',
    schema: GetBoardActionsSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.boardId);
      if (!gate.ok) return gate;

      return client.get(`/boards/${args.board_id}/actions`, {
        query: { filter: args.filter, limit: args.limit ?? 50 },
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_create_board_label',
    description: 'Create a label on a board',
    schema: CreateBoardLabelSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.createLabel),
        () => validator.resourceExists('board', args.board_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post(`/boards/${args.board_id}/labels`, {
        body: { name: args.name, color: args.color },
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_create_board',
    description:
      'Create a board. When id_organization is given, the workspace must exist and you must be a member of it.',
    schema: CreateBoardSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const checks: PreflightCheck[] = [() => validator.shapeValid(args, rules.createBoard)];
      const workspaceId = args.id_organization;
      if (workspaceId) {
        checks.push(
          () => validator.resourceExists('workspace', workspaceId, signal),
          () => validator.hasPermission('workspace', workspaceId, 'normal', signal)
        );
      }
      const sourceId = args.id_board_source;
      if (sourceId) {
        checks.push(() => validator.resourceExists('board', sourceId, signal));
      }

      const gate = await runPreflight(checks);
      if (!gate.ok) return gate;

      return client.post('/boards', {
        body: {
          name: args.name,
          desc: args.desc,
          idOrganization: args.id_organization,
          idBoardSource: args.id_board_source,
          defaultLists: args.default_lists,
          defaultLabels: args.default_labels,
          prefs_permissionLevel: args.permission_level ?? 'private',
          prefs_voting: args.voting,
          prefs_comments: args.comments,
        },
        resource: { kind: 'board' },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_board',
    description: 'Update board name, description, visibility or workspace, or archive it',
    schema: UpdateBoardSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const checks: PreflightCheck[] = [
        () => validator.shapeValid(args, rules.updateBoard),
        () => validator.resourceExists('board', args.board_id, signal),
      ];
      const workspaceId = args.id_organization;
      if (workspaceId) {
        checks.push(() => validator.resourceExists('workspace', workspaceId, signal));
      }

      const gate = await runPreflight(checks);
      if (!gate.ok) return gate;

      return client.put(`/boards/${args.board_id}`, {
        body: {
          name: args.name,
          desc: args.desc,
          closed: args.closed,
          idOrganization: args.id_organization,
          'prefs/permissionLevel': args.permission_level,
        },
        resource: { kind: 'board', id: args.board_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_board',
    description: 'Permanently delete a board. Requires admin membership on the board. This cannot be undone.',
    schema: BoardIdSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.boardId),
        () => validator.resourceExists('board', args.board_id, signal),
        () => validator.hasPermission('board', args.board_id, 'admin', signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/boards/${args.board_id}`, {
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
      return mapResult(result, () => ({
        success: true,
        message: `Board ${args.board_id} has been permanently deleted`,
      }));
    },
  });
}
