import { mapResult } from '../errors.js';
import { BOARD_FILTERS, rules } from '../rules.js';
import { runPreflight } from '../validation.js';
import {
  CreateWorkspaceSchema,
  EmptySchema,
  GetWorkspaceBoardsSchema,
  UpdateWorkspaceSchema,
  WorkspaceRefSchema,
} from '../schemas.js';
import { CREATES, DESTRUCTIVE, READ_ONLY, UPDATES, type OperationContext, type ToolRegistry } from './registry.js';

const WORKSPACE_FIELDS = 'name,displayName,desc,url,website';

export function registerWorkspaceOperations(registry: ToolRegistry, { client, validator }: OperationContext): void {
  registry.register({
    name: 'trello_get_workspaces',
    description: 'List the workspaces of the authenticated member',
    schema: EmptySchema,
    annotations: READ_ONLY,
    handler: async (_args, { signal }) =>
      client.get('/members/me/organizations', {
        query: { fields: WORKSPACE_FIELDS },
        resource: { kind: 'member', id: 'me' },
        signal,
      }),
  });

  registry.register({
    name: 'trello_get_workspace',
    description: 'Get a workspace by ID or short name',
    schema: WorkspaceRefSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.workspaceRef);
      if (!gate.ok) return gate;

      return client.get(`/organizations/${encodeURIComponent(args.workspace_id)}`, {
        query: { fields: WORKSPACE_FIELDS },
        resource: { kind: 'workspace', id: args.workspace_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_get_workspace_boards',
    description: 'List the boards of a workspace',
    schema: GetWorkspaceBoardsSchema,
    annotations: READ_ONLY,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, [
        ...rules.workspaceRef,
        { field: 'filter', constraint: { type: 'oneOf', values: BOARD_FILTERS } },
      ]);
      if (!gate.ok) return gate;

      return client.get(`/organizations/${encodeURIComponent(args.workspace_id)}/boards`, {
        query: { filter: args.filter ?? 'open', fields: 'name,desc,closed,url' },
        resource: { kind: 'workspace', id: args.workspace_id },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_create_workspace',
    description: 'Create a workspace',
    schema: CreateWorkspaceSchema,
    annotations: CREATES,
    handler: async (args, { signal }) => {
      const gate = validator.shapeValid(args, rules.createWorkspace);
      if (!gate.ok) return gate;

      return client.post('/organizations', {
        body: {
          displayName: args.display_name,
          desc: args.desc,
          name: args.name,
          website: args.website,
        },
        resource: { kind: 'workspace' },
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_update_workspace',
    description: 'Update a workspace. Requires admin membership on the workspace.',
    schema: UpdateWorkspaceSchema,
    annotations: UPDATES,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.updateWorkspace),
        () => validator.resourceExists('workspace', args.workspace_id, signal),
        () => validator.hasPermission('workspace', args.workspace_id, 'admin', signal),
      ]);
      if (!gate.ok) return gate;

      return client.put(`/organizations/${encodeURIComponent(args.workspace_id)}`, {
        body: {
          displayName: args.display_name,
          desc: args.desc,
          name: args.name,
          website: args.website,
        },
        resource: { kind: 'workspace', id: args.workspace_id },
        idempotent: true,
        signal,
      });
    },
  });

  registry.register({
    name: 'trello_delete_workspace',
    description: 'Permanently delete a workspace. Requires admin membership. Boards inside are not deleted.',
    schema: WorkspaceRefSchema,
    annotations: DESTRUCTIVE,
    handler: async (args, { signal }) => {
      const gate = await runPreflight([
        () => validator.shapeValid(args, rules.workspaceRef),
        () => validator.resourceExists('workspace', args.workspace_id, signal),
        () => validator.hasPermission('workspace', args.workspace_id, 'admin', signal),
      ]);
      if (!gate.ok) return gate;

      const result = await client.delete(`/organizations/${encodeURIComponent(args.workspace_id)}`, {
        resource: { kind: 'workspace', id: args.workspace_id },
        signal,
      });
      return mapResult(result, () => ({ success: true, message: `Workspace ${args.workspace_id} has been deleted` }));
    },
  });
}
