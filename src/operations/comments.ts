import { mapResult } from '../errors.js';
import { rules } from '../rules.js';
import { runPreflight } from '../validation.js';
import {
  AddCommentSchema,
  CommentIdSchema,
  GetCardActionsSchema,
  GetCardCommentsSchema,
  UpdateCommentSchema,
} from '../schemas.js';
import { CREATES, DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

export function registerCommentOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_get_card_comments',
    description: 'List the comments on a card, newest first',
    schema: GetCardCommentsSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.cardId);
      if (!gate.ok) return gate;

      return client.get(`/cards/${args.card_id}/actions`, {
        query: { filter: 'commentCard', limit: args.limit ?? 50 },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_card_actions',
    description: 'List the activity on a card (comments, updates, moves, attachments), newest first',
    schema: GetCardActionsSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.cardActions);
      if (!gate.ok) return gate;

      return client.get(`/cards/${args.card_id}/actions`, {
        query: { filter: args.filter ?? 'all', limit: args.limit ?? 50 },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_add_comment',
    description: 'Add a comment to a card',
    schema: AddCommentSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.addComment),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post(`/cards/${args.card_id}/actions/comments`, {
        body: { text: args.text },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_comment',
    description: 'Edit the text of one of your comments',
    schema: UpdateCommentSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.updateComment),
        () => validator.resourceExists('comment', args.comment_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/actions/${args.comment_id}`, {
        body: { text: args.text },
        resource: { kind: 'comment', id: args.comment_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_comment',
    description: 'Delete one of your comments',
    schema: CommentIdSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.commentId),
        () => validator.resourceExists('comment', args.comment_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/actions/${args.comment_id}`, {
        resource: { kind: 'comment', id: args.comment_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Comment ${args.comment_id} has been deleted` }));
    },
  });
}
