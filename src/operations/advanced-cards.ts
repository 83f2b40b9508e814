import { mapResult } from '../errors.js';
import { rules } from '../rules.js';
import { runPreflight } from '../validation.js';
import { CardIdSchema, CardVoteSchema, SetDueCompleteSchema, SetStartDateSchema } from '../schemas.js';
import { CREATES, DESTRUCTIVE, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

export function registerAdvancedCardOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_vote_on_card',
    description: 'Add a member vote to a card. Voting must be enabled on the board.',
    schema: CardVoteSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.cardVote),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post(`/cards/${args.card_id}/idMembersVoted`, {
        body: { value: args.member_id },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_remove_vote_from_card',
    description: 'Remove a member vote from a card',
    schema: CardVoteSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.cardVote),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/cards/${args.card_id}/idMembersVoted/${args.member_id}`, {
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Vote by ${args.member_id} has been removed` }));
    },
  });

  for (const subscribed of [true, false]) {
    registry.register({
      name: subscribed ? 'trello_subscribe_to_card' : 'trello_unsubscribe_from_card',
      description: subscribed
        ? 'Subscribe the token owner to notifications for a card'
        : 'Stop notifications for a card',
      schema: CardIdSchema,
      annotations: UPDATES,
      handler: async (args, { signal }) => {
        const gate = await runPreflight([
          () => validator.shapeValid(args, rules.cardId),
          () => validator.resourceExists('card', args.card_id, signal),
        ]);
        if (!gate.ok) return gate;

        return client.put(`/cards/${args.card_id}`, {
          body: { subscribed },
          resource: { kind: 'card', id: args.card_id },
          idempotent: true,
          signal,
        });
      },
    });
  }

  registry.register({
    name: 'trello_set_card_start_date',
    description: 'Set or clear (null) the start date of a card',
    schema: SetStartDateSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.setStartDate),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/cards/${args.card_id}`, {
        body: { start: args.start },
        resource: { kind: 'card', id: args.card_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_set_card_due_complete',
    description: 'Mark the due date of a card complete or incomplete',
    schema: SetDueCompleteSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.setDueComplete),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/cards/${args.card_id}`, {
        body: { dueComplete: args.complete },
        resource: { kind: 'card', id: args.card_id },
        idempotent: true,
        signal,
      });
    },
  });
}
