import { mapResult } from '../errors.js';
import { rules } from '../rules.js';
import { runPreflight } from '../validation.js';
import {
  AddCheckItemSchema,
  CardIdSchema,
  ChecklistIdSchema,
  CreateChecklistSchema,
  DeleteCheckItemSchema,
  UpdateCheckItemSchema,
} from '../schemas.js';
import { CREATES, DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

export function registerChecklistOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_get_card_checklists',
    description: 'List the checklists of a card with their items',
    schema: CardIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.cardId);
      if (!gate.ok) return gate;

      return client.get(`/cards/${args.card_id}/checklists`, {
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_checklist',
    description: 'Get a checklist by ID',
    schema: ChecklistIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.checklistId);
      if (!gate.ok) return gate;

      return client.get(`/checklists/${args.checklist_id}`, {
        resource: { kind: 'checklist', id: args.checklist_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_create_checklist',
    description: 'Add a checklist to a card',
    schema: CreateChecklistSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.createChecklist),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post('/checklists', {
        body: { idCard: args.card_id, name: args.name, pos: args.pos },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_checklist',
    description: 'Delete a checklist and all of its items',
    schema: ChecklistIdSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.checklistId),
        () => validator.resourceExists('checklist', args.checklist_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/checklists/${args.checklist_id}`, {
        resource: { kind: 'checklist', id: args.checklist_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Checklist ${args.checklist_id} has been deleted` }));
    },
  });

  registry.register({
    name: 'trello_add_checkitem',
    description: 'Add an item to a checklist',
    schema: AddCheckItemSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.addCheckItem),
        () => validator.resourceExists('checklist', args.checklist_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post(`/checklists/${args.checklist_id}/checkItems`, {
        body: { name: args.name, pos: args.pos, checked: args.checked },
        resource: { kind: 'checklist', id: args.checklist_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_checkitem',
    description: 'Rename, reposition, or complete/uncomplete a checklist item',
    schema: UpdateCheckItemSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.updateCheckItem),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/cards/${args.card_id}/checkItem/${args.checkitem_id}`, {
        body: { name: args.name, state: args.state, pos: args.pos },
        resource: { kind: 'checkItem', id: args.checkitem_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_checkitem',
    description: 'Delete an item from a checklist',
    schema: DeleteCheckItemSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.deleteCheckItem),
        () => validator.resourceExists('checklist', args.checklist_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/checklists/${args.checklist_id}/checkItems/${args.checkitem_id}`, {
        resource: { kind: 'checkItem', id: args.checkitem_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Check item ${args.checkitem_id} has been deleted` }));
    },
  });
}
