import { mapResult } from '../errors.js';
import { rules } from '../rules.js';
import { runPreflight } from '../validation.js';
import { CreateWebhookSchema, UpdateWebhookSchema, WebhookIdSchema } from '../schemas.js';
import { CREATES, DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

export function registerWebhookOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_create_webhook',
    description:
      'Create a webhook for a board, list, card or member. Trello verifies the callback URL with a HEAD request.',
    schema: CreateWebhookSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.createWebhook);
      if (!gate.ok) return gate;

      return client.post('/webhooks', {
        body: {
          callbackURL: args.callback_url,
          idModel: args.id_model,
          description: args.description,
          active: args.active,
        },
        resource: { kind: 'webhook' },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_webhook',
    description: 'Get a webhook by ID',
    schema: WebhookIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.webhookId);
      if (!gate.ok) return gate;

      return client.get(`/webhooks/${args.webhook_id}`, {
        resource: { kind: 'webhook', id: args.webhook_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_webhook',
    description: 'Change the callback URL, model, description or active state of a webhook',
    schema: UpdateWebhookSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.updateWebhook),
        () => validator.resourceExists('webhook', args.webhook_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/webhooks/${args.webhook_id}`, {
        body: {
          callbackURL: args.callback_url,
          idModel: args.id_model,
          description: args.description,
          active: args.active,
        },
        resource: { kind: 'webhook', id: args.webhook_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_webhook',
    description: 'Delete a webhook',
    schema: WebhookIdSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.webhookId),
        () => validator.resourceExists('webhook', args.webhook_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/webhooks/${args.webhook_id}`, {
        resource: { kind: 'webhook', id: args.webhook_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Webhook ${args.webhook_id} has been deleted` }));
    },
  });
}
