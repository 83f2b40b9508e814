import { rules } from '../rules.js';
import { BatchSchema, SearchMembersSchema, SearchSchema } from '../schemas.js';
import { READ_ONLY, type OperationContext, type ToolRegistry } from './registry.js';

export function registerSearchOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_search',
    description: 'Search boards, cards, members, workspaces and actions',
    schema: SearchSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.search);
      if (!gate.ok) return gate;

      const limit = args.limit ?? 10;
      return client.get('/search', {
        query: {
          query: args.query,
          modelTypes: args.model_types ?? ['all'],
          idBoards: args.board_id,
          cards_limit: limit,
          boards_limit: limit,
          partial: args.partial,
        },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_search_members',
    description: 'Find members by name, username or email, e.g. before assigning them to a card',
    schema: SearchMembersSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.searchMembers);
      if (!gate.ok) return gate;

      return client.get('/search/members', {
        query: {
          query: args.query,
          limit: args.limit ?? 8,
          idBoard: args.board_id,
          idOrganization: args.workspace_id,
        },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_batch_get',
    description: 'Run up to 10 GET routes in one request, e.g. ["/boards/{id}", "/cards/{id}"]',
    schema: BatchSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.batch);
      if (!gate.ok) return gate;

      return client.get('/batch', {
        query: { urls: args.urls },
        signal,
      });
    },
  });
}
