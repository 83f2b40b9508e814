import { mapResult } from '../errors.js';
import { rules } from '../rules.js';
import { runPreflight } from '../validation.js';
import { AttachmentCoverSchema, AttachUrlSchema, CardIdSchema, DeleteAttachmentSchema } from '../schemas.js';
import { CREATES, DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

export function registerAttachmentOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_get_card_attachments',
    description: 'List the attachments of a card',
    schema: CardIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.cardId);
      if (!gate.ok) return gate;

      return client.get(`/cards/${args.card_id}/attachments`, {
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_attach_url',
    description: 'Attach a link to a card',
    schema: AttachUrlSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.attachUrl),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.post(`/cards/${args.card_id}/attachments`, {
        body: { url: args.url, name: args.name },
        resource: { kind: 'card', id: args.card_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_attachment',
    description: 'Remove an attachment from a card',
    schema: DeleteAttachmentSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.deleteAttachment),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/cards/${args.card_id}/attachments/${args.attachment_id}`, {
        resource: { kind: 'attachment', id: args.attachment_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Attachment ${args.attachment_id} has been removed` }));
    },
  });

  registry.register({
    name: 'trello_set_attachment_as_cover',
    description: 'Show an image attachment as the cover of its card',
    schema: AttachmentCoverSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.attachmentCover),
        () => validator.resourceExists('card', args.card_id, signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/cards/${args.card_id}`, {
        body: { idAttachmentCover: args.attachment_id },
        resource: { kind: 'card', id: args.card_id },
        idempotent: true,
        signal,
      });
    },
  });
}
