import { rules } from '../rules.js';
import { runPreflight, type PreflightCheck } from '../validation.js';
import { CreateListSchema, GetListsSchema, ListIdSchema, UpdateListSchema } from '../schemas.js';
import { CREATES, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

export function registerListOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_get_lists',
    description: 'List the lists of a board',
    schema: GetListsSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.boardLists);
      if (!gate.ok) return gate;

      return client.get(`/boards/${args.board_id}/lists`, {
        query: { filter: args.filter ?? 'open' },
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_list',
    description: 'Get a list by ID',
    schema: ListIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.listId);
      if (!gate.ok) return gate;

      return client.get(`/lists/${args.list_id}`, {
        resource: { kind: 'list', id: args.list_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_create_list',
    description: 'Create a list on a board',
    schema: CreateListSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.createList),
        () => validator.resourceExists('board', args.board_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post('/lists', {
        body: { name: args.name, idBoard: args.board_id, pos: args.pos },
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_list',
    description: 'Rename, reposition, archive or move a list',
    schema: UpdateListSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const checks: PreflightCheck[] = [
        () => validator.shapeValid(args, rules.updateList),
        () => validator.resourceExists('list', args.list_id, signal),
      ];
      const boardId = args.id_board;
      if (boardId) {
        checks.push(() => validator.resourceExists('board', boardId, signal));
      }

      const gate = await runPreflight(checks);
      if (!gate.ok) return gate;

      return client.put(`/lists/${args.list_id}`, {
        body: { name: args.name, closed: args.closed, idBoard: args.id_board, pos: args.pos },
        resource: { kind: 'list', id: args.list_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_archive_list',
    description: 'Archive a list (lists cannot be deleted, only archived)',
    schema: ListIdSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.listId),
        () => validator.resourceExists('list', args.list_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/lists/${args.list_id}/closed`, {
        body: { value: true },
        resource: { kind: 'list', id: args.list_id },
        idempotent: true,
        signal,
      });
    },
  });
}
