import { mapResult } from '../errors.js';
import { rules } from '../rules.js';
import { runPreflight, type PreflightCheck } from '../validation.js';
import {
  CardIdSchema,
  CreateCardSchema,
  GetCardSchema,
  GetCardsSchema,
  MoveCardSchema,
  SetDueDateSchema,
  UpdateCardSchema,
} from '../schemas.js';
import { CREATES, DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

const CARD_FIELDS = 'name,desc,closed,idList,idBoard,idMembers,idLabels,due,dueComplete,pos,url,dateLastActivity';

export function registerCardOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_get_cards',
    description: 'List the cards of a list (open cards by default)',
    schema: GetCardsSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.listCards);
      if (!gate.ok) return gate;

      return client.get(`/lists/${args.list_id}/cards/${args.filter ?? 'open'}`, {
        query: { fields: CARD_FIELDS },
        resource: { kind: 'list', id: args.list_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_card',
    description: 'Get a card by ID, optionally with checklists, members and attachments',
    schema: GetCardSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.cardId);
      if (!gate.ok) return gate;

      const details = args.include_details
        ? { checklists: 'all', members: true, attachments: true, labels: 'all' }
        : {};
      return client.get(`/cards/${args.card_id}`, {
        query: { fields: CARD_FIELDS, ...details },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_create_card',
    description: 'Create a card in a list',
    schema: CreateCardSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.createCard),
        () => validator.resourceExists('list', args.list_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post('/cards', {
        body: {
          idList: args.list_id,
          name: args.name,
          desc: args.desc,
          pos: args.pos,
          due: args.due,
          idMembers: args.id_members?.join(','),
          idLabels: args.id_labels?.join(','),
        },
        resource: { kind: 'list', id: args.list_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_card',
    description: 'Update card fields, archive it, or move it between lists and boards',
    schema: UpdateCardSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const checks: PreflightCheck[] = [
        () => validator.shapeValid(args, rules.updateCard),
        () => validator.resourceExists('card', args.card_id, signal),
      ];
      const listId = args.id_list;
      if (listId) {
        checks.push(() => validator.resourceExists('list', listId, signal));
      }

      const gate = await runPreflight(checks);
      if (!gate.ok) return gate;

      return client.put(`/cards/${args.card_id}`, {
        body: {
          name: args.name,
          desc: args.desc,
          closed: args.closed,
          idList: args.id_list,
          idBoard: args.id_board,
          pos: args.pos,
          due: args.due,
          dueComplete: args.due_complete,
        },
        resource: { kind: 'card', id: args.card_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_move_card',
    description: 'Move a card to another list, optionally on another board',
    schema: MoveCardSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const checks: PreflightCheck[] = [
        () => validator.shapeValid(args, rules.moveCard),
        () => validator.resourceExists('card', args.card_id, signal),
        () => validator.resourceExists('list', args.list_id, signal),
      ];
      const boardId = args.board_id;
      if (boardId) {
        checks.push(() => validator.resourceExists('board', boardId, signal));
      }

      const gate = await runPreflight(checks);
      if (!gate.ok) return gate;

      return client.put(`/cards/${args.card_id}`, {
        body: { idList: args.list_id, idBoard: args.board_id, pos: args.pos },
        resource: { kind: 'card', id: args.card_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_set_card_due_date',
    description: 'Set, complete or clear the due date of a card',
    schema: SetDueDateSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.setDueDate),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/cards/${args.card_id}`, {
        body: { due: args.due, dueComplete: args.due_complete },
        resource: { kind: 'card', id: args.card_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_card',
    description: 'Permanently delete a card. Prefer archiving with trello_update_card (closed: true).',
    schema: CardIdSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.cardId),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/cards/${args.card_id}`, {
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Card ${args.card_id} has been deleted` }));
    },
  });
}
