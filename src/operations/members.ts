import { mapResult } from '../errors.js';
import { rules } from '../rules.js';
import { runPreflight } from '../validation.js';
import { fieldList } from '../utils.js';
import {
  AddBoardMemberSchema,
  BoardIdSchema,
  BoardMemberSchema,
  CardIdSchema,
  CardMemberSchema,
  GetMemberSchema,
  UpdateBoardMemberSchema,
  WorkspaceRefSchema,
} from '../schemas.js';
import { DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

const MEMBER_FIELDS = ['username', 'fullName', 'initials', 'url', 'memberType'];

export function registerMemberOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_get_member',
    description: 'Get a member by ID or username; "me" is the authenticated member',
    schema: GetMemberSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.memberRef);
      if (!gate.ok) return gate;

      return client.get(`/members/${encodeURIComponent(args.member_id)}`, {
        query: { fields: fieldList(args.fields, MEMBER_FIELDS) },
        resource: { kind: 'member', id: args.member_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_board_members',
    description: 'List the members of a board',
    schema: BoardIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.boardId);
      if (!gate.ok) return gate;

      return client.get(`/boards/${args.board_id}/members`, {
        query: { fields: MEMBER_FIELDS.join(',') },
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_workspace_members',
    description: 'List the members of a workspace',
    schema: WorkspaceRefSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.workspaceRef);
      if (!gate.ok) return gate;

      return client.get(`/organizations/${encodeURIComponent(args.workspace_id)}/members`, {
        query: { fields: MEMBER_FIELDS.join(',') },
        resource: { kind: 'workspace', id: args.workspace_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_add_board_member',
    description: 'Invite someone to a board by email. Requires admin membership on the board.',
    schema: AddBoardMemberSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.addBoardMember),
        () => validator.resourceExists('board', args.board_id, signal),
        () => validator.hasPermission('board', args.board_id, 'admin', signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/boards/${args.board_id}/members`, {
        query: { email: args.email, type: args.member_type ?? 'normal' },
        body: { fullName: args.full_name },
        resource: { kind: 'board', id: args.board_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_board_member',
    description: "Change a member's role on a board. Requires admin membership on the board.",
    schema: UpdateBoardMemberSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.updateBoardMember),
        () => validator.resourceExists('board', args.board_id, signal),
        () => validator.hasPermission('board', args.board_id, 'admin', signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/boards/${args.board_id}/members/${args.member_id}`, {
        query: { type: args.member_type },
        resource: { kind: 'member', id: args.member_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_remove_board_member',
    description: 'Remove a member from a board. Requires admin membership on the board.',
    schema: BoardMemberSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.boardMember),
        () => validator.resourceExists('board', args.board_id, signal),
        () => validator.hasPermission('board', args.board_id, 'admin', signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/boards/${args.board_id}/members/${args.member_id}`, {
        resource: { kind: 'member', id: args.member_id },
        signal,
      });
      return mapResult(result, () => ({
        success: true,
        message: `Member ${args.member_id} removed from board ${args.board_id}`,
      }));
    },
  });

  registry.register({
    name: 'trello_get_card_members',
    description: 'List the members assigned to a card',
    schema: CardIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.cardId);
      if (!gate.ok) return gate;

      return client.get(`/cards/${args.card_id}/members`, {
        query: { fields: MEMBER_FIELDS.join(',') },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_add_card_member',
    description: 'Assign a member to a card',
    schema: CardMemberSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.cardMember),
        () => validator.resourceExists('card', args.card_id, signal),
        () => validator.resourceExists('member', args.member_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post(`/cards/${args.card_id}/idMembers`, {
        body: { value: args.member_id },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_remove_card_member',
    description: 'Unassign a member from a card',
    schema: CardMemberSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.cardMember),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/cards/${args.card_id}/idMembers/${args.member_id}`, {
        resource: { kind: 'member', id: args.member_id },
        signal,
      });
      return mapResult(result, () => ({
        success: true,
        message: `Member ${args.member_id} removed from card ${args.card_id}`,
      }));
    },
  });
}
