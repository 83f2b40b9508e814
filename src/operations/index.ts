import { registerAdvancedCardOperations } from './advanced-cards.js';
import { registerAttachmentOperations } from './attachments.js';
import { registerBoardOperations } from './boards.js';
import { registerCardOperations } from './cards.js';
import { registerChecklistOperations } from './checklists.js';
import { registerCommentOperations } from './comments.js';
import { registerCustomFieldOperations } from './custom-fields.js';
import { registerExportOperations } from './export.js';
import { registerLabelOperations } from './labels.js';
import { registerListOperations } from './lists.js';
import { registerMemberOperations } from './members.js';
import { registerSearchOperations } from './search.js';
import { registerWebhookOperations } from './webhooks.js';
import { registerWorkspaceOperations } from './workspaces.js';
import type { OperationContext, ToolRegistry } from './registry.js';

export { ToolRegistry, toolError, toolSuccess, type OperationContext, type ToolResponse } from './registry.js';
export { registerStatusOperations, type StatusContext } from './status.js';

export function registerTrelloOperations(registry: ToolRegistry, context: OperationContext): void {
  registerBoardOperations(registry, context);
  registerListOperations(registry, context);
  registerCardOperations(registry, context);
  registerAdvancedCardOperations(registry, context);
  registerChecklistOperations(registry, context);
  registerLabelOperations(registry, context);
  registerCommentOperations(registry, context);
  registerAttachmentOperations(registry, context);
  registerCustomFieldOperations(registry, context);
  registerMemberOperations(registry, context);
  registerWebhookOperations(registry, context);
  registerWorkspaceOperations(registry, context);
  registerSearchOperations(registry, context);
  registerExportOperations(registry, context);
}
