import { z } from 'zod';
import {
  fail,
  mapResult,
  PASS,
  validationError,
  type MembershipLevel,
  type Result,
  type ValidationOutcome,
} from '../errors.js';
import { rules, type RuleSet } from '../rules.js';
import { runPreflight } from '../validation.js';
import {
  AddCustomFieldOptionSchema,
  BoardIdSchema,
  CardIdSchema,
  CreateCustomFieldSchema,
  CustomFieldIdSchema,
  CustomFieldOptionSchema,
  SetCustomFieldCheckboxSchema,
  SetCustomFieldDateSchema,
  SetCustomFieldListSchema,
  SetCustomFieldNumberSchema,
  SetCustomFieldTextSchema,
  UpdateCustomFieldOptionSchema,
  UpdateCustomFieldSchema,
} from '../schemas.js';
import { CREATES, DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

const CustomFieldOwnerSchema = z.object({ idModel: z.string() });

export function registerCustomFieldOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  // Custom fields live on a board; edits need a role on that board
  async function boardOfField(fieldId: string, signal?: AbortSignal): Promise<Result<string>> {
    const field = await client.get(`/customFields/${fieldId}`, {
      query: { fields: 'idModel' },
      resource: { kind: 'customField', id: fieldId },
      schema: CustomFieldOwnerSchema,
      signal,
    });
    return mapResult(field, (value) => value.idModel);
  }

  function fieldEditGate(
    payload: Readonly<Record<string, unknown>>,
    ruleSet: RuleSet,
    fieldId: string,
    level: MembershipLevel,
    signal?: AbortSignal
  ): Promise<ValidationOutcome> {
    return runPreflight([
      () => validator.shapeValid(payload, ruleSet),
      async () => {
        const board = await boardOfField(fieldId, signal);
        if (!board.ok) return board;
        return validator.hasPermission('board', board.value, level, signal);
      },
    ]);
  }

  function cardValueGate(
    payload: Readonly<Record<string, unknown>>,
    ruleSet: RuleSet,
    cardId: string,
    fieldId: string,
    signal?: AbortSignal
  ): Promise<ValidationOutcome> {
    return runPreflight([
      () => validator.shapeValid(payload, ruleSet),
      () => validator.resourceExists('card', cardId, signal),
      () => validator.resourceExists('customField', fieldId, signal),
    ]);
  }

  function setItem(cardId: string, fieldId: string, body: Record<string, unknown>, signal?: AbortSignal) {
    return client.put(`/cards/${cardId}/customField/${fieldId}/item`, {
      body,
      resource: { kind: 'card', id: cardId },
      idempotent: true,
      signal,
    });
  }

  // ============================================
  // FIELD DEFINITIONS
  // ============================================

  registry.register({
    name: 'trello_get_board_custom_fields',
    description: 'List the custom fields defined on a board, with their options',
    schema: BoardIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.boardId);
      if (!gate.ok) return gate;

      return client.get(`/boards/${args.board_id}/customFields`, {
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_create_custom_field',
    description: 'Create a custom field on a board. Requires normal or admin membership on the board.',
    schema: CreateCustomFieldSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.createCustomField),
        () =>
          args.options && args.field_type !== 'list'
            ? fail(
                validationError(
                  [{ field: 'options', message: `Options apply only to list fields, not '${args.field_type}'` }],
                  { kind: 'board', id: args.board_id }
                )
              )
            : PASS,
        () => validator.resourceExists('board', args.board_id, signal),
        () => validator.hasPermission('board', args.board_id, 'normal', signal),
      ]);
      if (!gate.ok) return gate;

      return client.post('/customFields', {
        body: {
          idModel: args.board_id,
          modelType: 'board',
          name: args.name,
          type: args.field_type,
          pos: args.pos ?? 'bottom',
          display_cardFront: args.show_on_card_front,
          options: args.options?.map((text, index) => ({ value: { text }, color: 'none', pos: index + 1 })),
        },
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_custom_field',
    description: 'Rename, move or toggle card-front display of a custom field',
    schema: UpdateCustomFieldSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await fieldEditGate(args, rules.updateCustomField, args.field_id, 'normal', signal);
      if (!gate.ok) return gate;

      return client.put(`/customFields/${args.field_id}`, {
        body: {
          name: args.name,
          pos: args.pos,
          'display/cardFront': args.show_on_card_front,
        },
        resource: { kind: 'customField', id: args.field_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_custom_field',
    description:
      'Permanently delete a custom field and its value on every card. Requires admin membership on the board.',
    schema: CustomFieldIdSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await fieldEditGate(args, rules.customFieldId, args.field_id, 'admin', signal);
      if (!gate.ok) return gate;

      const result = await client.delete(`/customFields/${args.field_id}`, {
        resource: { kind: 'customField', id: args.field_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Custom field ${args.field_id} has been deleted` }));
    },
  });

  // ============================================
  // LIST OPTIONS
  // ============================================

  registry.register({
    name: 'trello_add_custom_field_option',
    description: 'Add an option to a list-type custom field',
    schema: AddCustomFieldOptionSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await fieldEditGate(args, rules.addCustomFieldOption, args.field_id, 'normal', signal);
      if (!gate.ok) return gate;

      return client.post(`/customFields/${args.field_id}/options`, {
        body: { value: { text: args.text }, color: args.color ?? 'none', pos: args.pos ?? 'bottom' },
        resource: { kind: 'customField', id: args.field_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_custom_field_option',
    description: 'Change the text, color or position of a list option',
    schema: UpdateCustomFieldOptionSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await fieldEditGate(args, rules.updateCustomFieldOption, args.field_id, 'normal', signal);
      if (!gate.ok) return gate;

      return client.put(`/customFields/${args.field_id}/options/${args.option_id}`, {
        body: {
          value: args.text === undefined ? undefined : { text: args.text },
          color: args.color,
          pos: args.pos,
        },
        resource: { kind: 'customFieldOption', id: args.option_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_custom_field_option',
    description: 'Remove an option from a list-type custom field. Cards using it lose the value.',
    schema: CustomFieldOptionSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await fieldEditGate(args, rules.customFieldOption, args.field_id, 'normal', signal);
      if (!gate.ok) return gate;

      const result = await client.delete(`/customFields/${args.field_id}/options/${args.option_id}`, {
        resource: { kind: 'customFieldOption', id: args.option_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Option ${args.option_id} has been removed` }));
    },
  });

  // ============================================
  // CARD VALUES
  // ============================================

  registry.register({
    name: 'trello_get_card_custom_field_values',
    description: 'Get the custom field values set on a card',
    schema: CardIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.cardId);
      if (!gate.ok) return gate;

      return client.get(`/cards/${args.card_id}/customFieldItems`, {
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_set_custom_field_value_text',
    description: 'Set a text custom field on a card',
    schema: SetCustomFieldTextSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await cardValueGate(args, rules.setCustomFieldText, args.card_id, args.field_id, signal);
      if (!gate.ok) return gate;
      return setItem(args.card_id, args.field_id, { value: { text: args.text } }, signal);
    },
  });

  registry.register({
    name: 'trello_set_custom_field_value_number',
    description: 'Set a number custom field on a card',
    schema: SetCustomFieldNumberSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await cardValueGate(args, rules.setCustomFieldNumber, args.card_id, args.field_id, signal);
      if (!gate.ok) return gate;
      // Trello stores numbers as strings
      return setItem(args.card_id, args.field_id, { value: { number: String(args.number) } }, signal);
    },
  });

  registry.register({
    name: 'trello_set_custom_field_value_date',
    description: 'Set a date custom field on a card',
    schema: SetCustomFieldDateSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await cardValueGate(args, rules.setCustomFieldDate, args.card_id, args.field_id, signal);
      if (!gate.ok) return gate;
      return setItem(args.card_id, args.field_id, { value: { date: args.date } }, signal);
    },
  });

  registry.register({
    name: 'trello_set_custom_field_value_checkbox',
    description: 'Check or uncheck a checkbox custom field on a card',
    schema: SetCustomFieldCheckboxSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await cardValueGate(args, rules.setCustomFieldCheckbox, args.card_id, args.field_id, signal);
      if (!gate.ok) return gate;
      return setItem(args.card_id, args.field_id, { value: { checked: String(args.checked) } }, signal);
    },
  });

  registry.register({
    name: 'trello_set_custom_field_value_list',
    description: 'Select an option of a list custom field on a card',
    schema: SetCustomFieldListSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await cardValueGate(args, rules.setCustomFieldList, args.card_id, args.field_id, signal);
      if (!gate.ok) return gate;
      return setItem(args.card_id, args.field_id, { idValue: args.option_id }, signal);
    },
  });
}
