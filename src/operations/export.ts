import { rules } from '../rules.js';
import { runPreflight, type PreflightCheck } from '../validation.js';
import { BoardIdSchema, CreateFromTemplateSchema } from '../schemas.js';
import { CREATES, READ_ONLY, type OperationContext, type ToolRegistry } from './registry.js';

/** Everything Trello will nest in one board read. Actions stop at 1000. */
const EXPORT_QUERY = {
  fields: 'all',
  actions: 'all',
  action_fields: 'all',
  actions_limit: 1000,
  cards: 'all',
  card_fields: 'all',
  card_attachments: true,
  labels: 'all',
  lists: 'all',
  list_fields: 'all',
  members: 'all',
  member_fields: 'all',
  checklists: 'all',
  checklist_fields: 'all',
  customFields: true,
} as const;

export function registerExportOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_export_board',
    description:
      'Export a board as JSON: lists, cards, labels, checklists, members, custom fields and the last 1000 actions',
    schema: BoardIdSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.boardId);
      if (!gate.ok) return gate;

      return client.get(`/boards/${args.board_id}`, {
        query: EXPORT_QUERY,
        resource: { kind: 'board', id: args.board_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_create_board_from_template',
    description:
      'Create a board by copying the lists and labels of another board, optionally with its cards. ' +
      'Creating inside a workspace requires normal or admin membership there.',
    schema: CreateFromTemplateSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const checks: PreflightCheck[] = [
        () => validator.shapeValid(args, rules.createFromTemplate),
        () => validator.resourceExists('board', args.template_board_id, signal),
      ];
      const workspaceId = args.id_organization;
      if (workspaceId !== undefined) {
        checks.push(
          () => validator.resourceExists('workspace', workspaceId, signal),
          () => validator.hasPermission('workspace', workspaceId, 'normal', signal)
        );
      }
      const gate = await runPreflight(checks);
      if (!gate.ok) return gate;

      return client.post('/boards', {
        body: {
          name: args.name,
          idBoardSource: args.template_board_id,
          keepFromSource: args.keep_cards ? 'cards' : 'none',
          idOrganization: workspaceId,
          prefs_permissionLevel: args.permission_level ?? 'private',
        },
        resource: { kind: 'board', id: args.template_board_id },
        signal,
      });
    },
  });
}
