import { mapResult } from '../errors.js';
import { rules } from '../rules.js';
import { runPreflight } from '../validation.js';
import { CardIdSchema, CardLabelSchema, LabelIdSchema, UpdateLabelSchema } from '../schemas.js';
import { DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

export function registerLabelOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_get_card_labels',
    description: 'List the labels applied to a card',
    schema: CardIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.cardId);
      if (!gate.ok) return gate;

      return client.get(`/cards/${args.card_id}/labels`, {
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_label',
    description: 'Rename or recolor a label',
    schema: UpdateLabelSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.updateLabel),
        () => validator.resourceExists('label', args.label_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/labels/${args.label_id}`, {
        body: { name: args.name, color: args.color },
        resource: { kind: 'label', id: args.label_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_label',
    description: 'Delete a label from its board and from every card using it',
    schema: LabelIdSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.labelId),
        () => validator.resourceExists('label', args.label_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/labels/${args.label_id}`, {
        resource: { kind: 'label', id: args.label_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Label ${args.label_id} has been deleted` }));
    },
  });

  registry.register({
    name: 'trello_add_label_to_card',
    description: 'Apply an existing label to a card',
    schema: CardLabelSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.cardLabel),
        () => validator.resourceExists('card', args.card_id, signal),
        () => validator.resourceExists('label', args.label_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post(`/cards/${args.card_id}/idLabels`, {
        body: { value: args.label_id },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_remove_label_from_card',
    description: 'Remove a label from a card',
    schema: CardLabelSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.cardLabel),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/cards/${args.card_id}/idLabels/${args.label_id}`, {
        resource: { kind: 'label', id: args.label_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Label ${args.label_id} removed from card ${args.card_id}` }));
    },
  });
}
