import { z } from 'zod';

// Argument structure only. Formats, lengths and enumerations are checked
// against the rule tables in rules.ts so that every violation is reported
// as a Validation error with the same wording.

// ============================================
// COMMON SCHEMAS
// ============================================

const id = (what: string) => z.string().describe(`The 24-character ID of the ${what}`);

const BoardId = id('board');
const ListId = id('list');
const CardId = id('card');
const ChecklistId = id('checklist');

const Position = z
  .union([z.enum(['top', 'bottom']), z.number().positive()])
  .optional()
  .describe('Position: "top", "bottom" or a positive number');

const Fields = z
  .array(z.string())
  .optional()
  .describe('Fields to return (optional, defaults to a compact set)');

export const EmptySchema = z.object({});

// ============================================
// BOARD SCHEMAS
// ============================================

export const ListBoardsSchema = z.object({
  filter: z
    .string()
    .optional()
    .describe('Filter: all, open, closed, members, organization, public or starred (default: open)'),
  fields: Fields,
});

export const GetBoardSchema = z.object({
  board_id: BoardId,
  include_lists: z.boolean().optional().describe('Include the open lists of the board'),
  fields: Fields,
});

export const BoardIdSchema = z.object({
  board_id: BoardId,
});

export const CreateBoardLabelSchema = z.object({
  board_id: BoardId,
  name: z.string().describe('Label name'),
  color: z.string().describe('Color: yellow, purple, blue, red, green, orange, black, sky, pink or lime'),
});

export const CreateBoardSchema = z.object({
  name: z.string().describe('Board name (1 to 16384 characters)'),
  desc: z.string().optional().describe('Board description'),
  id_organization: z.string().optional().describe('Workspace ID to create the board in'),
  id_board_source: z.string().optional().describe('Board ID to copy'),
  default_lists: z.boolean().optional().describe('Create the default lists (To Do, Doing, Done)'),
  default_labels: z.boolean().optional().describe('Create the default labels'),
  permission_level: z.string().optional().describe('Visibility: private, org or public (default: private)'),
  voting: z.string().optional().describe('Who can vote: disabled, members, observers, org or public'),
  comments: z.string().optional().describe('Who can comment: disabled, members, observers, org or public'),
});

export const UpdateBoardSchema = z.object({
  board_id: BoardId,
  name: z.string().optional().describe('New board name'),
  desc: z.string().optional().describe('New description'),
  closed: z.boolean().optional().describe('Archive (true) or reopen (false) the board'),
  id_organization: z.string().optional().describe('Move the board to this workspace'),
  permission_level: z.string().optional().describe('Visibility: private, org or public'),
});

export const GetBoardActionsSchema = z.object({
  board_id: BoardId,
  filter: z.string().optional().describe('Comma-separated action types, e.g. "createCard,updateCard"'),
  limit: z.number().int().min(1).max(1000).optional().describe('Maximum number of actions (default: 50)'),
});

// ============================================
// LIST SCHEMAS
// ============================================

export const GetListsSchema = z.object({
  board_id: BoardId,
  filter: z.string().optional().describe('Filter: all, open or closed (default: open)'),
});

export const ListIdSchema = z.object({
  list_id: ListId,
});

export const CreateListSchema = z.object({
  board_id: BoardId,
  name: z.string().describe('List name'),
  pos: Position,
});

export const UpdateListSchema = z.object({
  list_id: ListId,
  name: z.string().optional().describe('New list name'),
  closed: z.boolean().optional().describe('Archive (true) or reopen (false) the list'),
  id_board: z.string().optional().describe('Move the list to this board'),
  pos: Position,
});

// ============================================
// CARD SCHEMAS
// ============================================

export const GetCardSchema = z.object({
  card_id: CardId,
  include_details: z.boolean().optional().describe('Include checklists, members and attachments'),
});

export const CardIdSchema = z.object({
  card_id: CardId,
});

export const GetCardsSchema = z.object({
  list_id: ListId,
  filter: z.string().optional().describe('Filter: all, open, closed or visible (default: open)'),
});

export const CreateCardSchema = z.object({
  list_id: ListId,
  name: z.string().describe('Card title'),
  desc: z.string().optional().describe('Card description (Markdown)'),
  pos: Position,
  due: z.string().optional().describe('Due date in ISO-8601 format'),
  id_members: z.array(z.string()).optional().describe('Member IDs to assign'),
  id_labels: z.array(z.string()).optional().describe('Label IDs to apply'),
});

export const UpdateCardSchema = z.object({
  card_id: CardId,
  name: z.string().optional().describe('New title'),
  desc: z.string().optional().describe('New description'),
  closed: z.boolean().optional().describe('Archive (true) or reopen (false) the card'),
  id_list: z.string().optional().describe('Move to this list'),
  id_board: z.string().optional().describe('Move to this board'),
  pos: Position,
  due: z.string().optional().describe('Due date in ISO-8601 format'),
  due_complete: z.boolean().optional().describe('Mark the due date complete'),
});

export const MoveCardSchema = z.object({
  card_id: CardId,
  list_id: ListId.describe('The 24-character ID of the destination list'),
  board_id: z.string().optional().describe('Destination board, when moving across boards'),
  pos: Position,
});

export const SetDueDateSchema = z.object({
  card_id: CardId,
  due: z.string().nullable().describe('Due date in ISO-8601 format, or null to clear it'),
  due_complete: z.boolean().optional().describe('Mark the due date complete'),
});

export const GetCardActionsSchema = z.object({
  card_id: CardId,
  filter: z
    .string()
    .optional()
    .describe('Action type: all, commentCard, updateCard, createCard, addAttachmentToCard or addMemberToCard (default: all)'),
  limit: z.number().int().optional().describe('Maximum number of actions, 1 to 1000 (default: 50)'),
});

export const CardVoteSchema = z.object({
  card_id: CardId,
  member_id: id('voting member'),
});

export const SetStartDateSchema = z.object({
  card_id: CardId,
  start: z.string().nullable().describe('Start date in ISO-8601 format, or null to clear it'),
});

export const SetDueCompleteSchema = z.object({
  card_id: CardId,
  complete: z.boolean().describe('true to mark the due date complete, false to reopen it'),
});

// ============================================
// CHECKLIST SCHEMAS
// ============================================

export const ChecklistIdSchema = z.object({
  checklist_id: ChecklistId,
});

export const CreateChecklistSchema = z.object({
  card_id: CardId,
  name: z.string().describe('Checklist name'),
  pos: Position,
});

export const AddCheckItemSchema = z.object({
  checklist_id: ChecklistId,
  name: z.string().describe('Check item text'),
  pos: Position,
  checked: z.boolean().optional().describe('Create the item already checked'),
});

export const UpdateCheckItemSchema = z.object({
  card_id: CardId,
  checkitem_id: id('check item'),
  name: z.string().optional().describe('New text'),
  state: z.string().optional().describe('State: complete or incomplete'),
  pos: Position,
});

export const DeleteCheckItemSchema = z.object({
  checklist_id: ChecklistId,
  checkitem_id: id('check item'),
});

// ============================================
// LABEL SCHEMAS
// ============================================

export const LabelIdSchema = z.object({
  label_id: id('label'),
});

export const UpdateLabelSchema = z.object({
  label_id: id('label'),
  name: z.string().optional().describe('New label name'),
  color: z.string().optional().describe('New color: yellow, purple, blue, red, green, orange, black, sky, pink or lime'),
});

export const CardLabelSchema = z.object({
  card_id: CardId,
  label_id: id('label'),
});

// ============================================
// COMMENT SCHEMAS
// ============================================

export const GetCardCommentsSchema = z.object({
  card_id: CardId,
  limit: z.number().int().min(1).max(1000).optional().describe('Maximum number of comments (default: 50)'),
});

export const AddCommentSchema = z.object({
  card_id: CardId,
  text: z.string().describe('Comment text'),
});

export const UpdateCommentSchema = z.object({
  comment_id: id('comment action'),
  text: z.string().describe('New comment text'),
});

export const CommentIdSchema = z.object({
  comment_id: id('comment action'),
});

// ============================================
// ATTACHMENT SCHEMAS
// ============================================

export const AttachUrlSchema = z.object({
  card_id: CardId,
  url: z.string().describe('HTTP or HTTPS URL to attach'),
  name: z.string().optional().describe('Attachment name'),
});

export const DeleteAttachmentSchema = z.object({
  card_id: CardId,
  attachment_id: id('attachment'),
});

export const AttachmentCoverSchema = z.object({
  card_id: CardId,
  attachment_id: id('image attachment to show as cover'),
});

// ============================================
// MEMBER SCHEMAS
// ============================================

export const GetMemberSchema = z.object({
  member_id: z.string().describe('"me", a username or a member ID'),
  fields: Fields,
});

export const AddBoardMemberSchema = z.object({
  board_id: BoardId,
  email: z.string().describe('Email address of the person to invite'),
  full_name: z.string().optional().describe('Full name, required by Trello for new accounts'),
  member_type: z.string().optional().describe('Role: admin, normal or observer (default: normal)'),
});

export const BoardMemberSchema = z.object({
  board_id: BoardId,
  member_id: id('member'),
});

export const UpdateBoardMemberSchema = z.object({
  board_id: BoardId,
  member_id: id('member'),
  member_type: z.string().describe('Role: admin, normal or observer'),
});

export const CardMemberSchema = z.object({
  card_id: CardId,
  member_id: id('member'),
});

// ============================================
// WEBHOOK SCHEMAS
// ============================================

export const CreateWebhookSchema = z.object({
  callback_url: z.string().describe('HTTPS URL that receives the webhook POSTs'),
  id_model: z.string().describe('ID of the board, list, card or member to watch'),
  description: z.string().optional().describe('Webhook description'),
  active: z.boolean().optional().describe('Whether the webhook is active (default: true)'),
});

export const WebhookIdSchema = z.object({
  webhook_id: id('webhook'),
});

export const UpdateWebhookSchema = z.object({
  webhook_id: id('webhook'),
  callback_url: z.string().optional().describe('New callback URL'),
  id_model: z.string().optional().describe('New model ID to watch'),
  description: z.string().optional().describe('New description'),
  active: z.boolean().optional().describe('Enable or disable the webhook'),
});

// ============================================
// WORKSPACE SCHEMAS
// ============================================

export const WorkspaceRefSchema = z.object({
  workspace_id: z.string().describe('Workspace ID or short name'),
});

export const GetWorkspaceBoardsSchema = z.object({
  workspace_id: z.string().describe('Workspace ID or short name'),
  filter: z.string().optional().describe('Filter: all, open, closed, members, organization or public'),
});

export const CreateWorkspaceSchema = z.object({
  display_name: z.string().describe('Display name (1 to 16384 characters)'),
  desc: z.string().optional().describe('Workspace description'),
  name: z
    .string()
    .optional()
    .describe('Short name: at least 3 lowercase letters, numbers or underscores'),
  website: z.string().optional().describe('Website URL (http or https)'),
});

export const UpdateWorkspaceSchema = z.object({
  workspace_id: z.string().describe('Workspace ID or short name'),
  display_name: z.string().optional().describe('New display name'),
  desc: z.string().optional().describe('New description'),
  name: z.string().optional().describe('New short name'),
  website: z.string().optional().describe('New website URL'),
});

// ============================================
// EXPORT SCHEMAS
// ============================================

export const CreateFromTemplateSchema = z.object({
  template_board_id: id('board to copy'),
  name: z.string().describe('Name of the new board'),
  id_organization: z.string().optional().describe('Workspace to create the board in'),
  keep_cards: z.boolean().optional().describe('Copy the cards as well as lists and labels (default: false)'),
  permission_level: z.string().optional().describe('Visibility: private, org or public (default: private)'),
});

// ============================================
// CUSTOM FIELD SCHEMAS
// ============================================

const CustomFieldId = id('custom field');

export const CustomFieldIdSchema = z.object({
  field_id: CustomFieldId,
});

export const CreateCustomFieldSchema = z.object({
  board_id: BoardId,
  name: z.string().describe('Field name (1 to 255 characters)'),
  field_type: z.string().describe('Type: text, number, date, checkbox or list'),
  pos: Position,
  options: z.array(z.string()).optional().describe('Option texts, list fields only'),
  show_on_card_front: z.boolean().optional().describe('Show the value on the card front (default: false)'),
});

export const UpdateCustomFieldSchema = z.object({
  field_id: CustomFieldId,
  name: z.string().optional().describe('New field name'),
  pos: Position,
  show_on_card_front: z.boolean().optional().describe('Show the value on the card front'),
});

export const AddCustomFieldOptionSchema = z.object({
  field_id: CustomFieldId,
  text: z.string().describe('Option text'),
  color: z.string().optional().describe('Label color or "none" (default: none)'),
  pos: Position,
});

export const UpdateCustomFieldOptionSchema = z.object({
  field_id: CustomFieldId,
  option_id: id('option'),
  text: z.string().optional().describe('New option text'),
  color: z.string().optional().describe('New color'),
  pos: Position,
});

export const CustomFieldOptionSchema = z.object({
  field_id: CustomFieldId,
  option_id: id('option'),
});

const CardField = {
  card_id: CardId,
  field_id: CustomFieldId,
};

export const SetCustomFieldTextSchema = z.object({ ...CardField, text: z.string().describe('Text value') });

export const SetCustomFieldNumberSchema = z.object({ ...CardField, number: z.number().describe('Numeric value') });

export const SetCustomFieldDateSchema = z.object({
  ...CardField,
  date: z.string().describe('Date in ISO-8601 format'),
});

export const SetCustomFieldCheckboxSchema = z.object({
  ...CardField,
  checked: z.boolean().describe('Checkbox state'),
});

export const SetCustomFieldListSchema = z.object({
  ...CardField,
  option_id: id('option to select'),
});

// ============================================
// SEARCH SCHEMAS
// ============================================

export const SearchSchema = z.object({
  query: z.string().describe('Search text; supports Trello operators such as @member or list:name'),
  model_types: z
    .array(z.enum(['actions', 'boards', 'cards', 'members', 'organizations', 'all']))
    .optional()
    .describe('What to search (default: all)'),
  board_id: z.string().optional().describe('Restrict the search to one board'),
  limit: z.number().int().optional().describe('Maximum cards and boards returned (1 to 1000, default: 10)'),
  partial: z.boolean().optional().describe('Match on word prefixes'),
});

export const SearchMembersSchema = z.object({
  query: z.string().describe('Name, username or email fragment'),
  limit: z.number().int().optional().describe('Maximum members returned, 1 to 20 (default: 8)'),
  board_id: z.string().optional().describe('Rank members of this board first'),
  workspace_id: z.string().optional().describe('Rank members of this workspace first (24-character ID)'),
});

export const BatchSchema = z.object({
  urls: z
    .array(z.string().regex(/^\/[^\s]*$/, 'Each route must be an API path starting with "/"'))
    .describe('Up to 10 GET routes, e.g. ["/boards/{id}", "/cards/{id}"]'),
});

// ============================================
// SERVER SCHEMAS
// ============================================

export const SetLogLevelSchema = z.object({
  level: z.enum(['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency', 'off']).describe('New log level'),
  enable_mcp_logs: z.boolean().optional().describe('Enable/disable MCP client logs'),
  enable_stderr_logs: z.boolean().optional().describe('Enable/disable stderr logs'),
  enable_file_logs: z.boolean().optional().describe('Enable/disable file logs'),
  enable_request_logs: z.boolean().optional().describe('Enable/disable detailed request logging'),
  enable_metrics: z.boolean().optional().describe('Enable/disable performance metrics collection'),
});

export type SetLogLevelArgs = z.infer<typeof SetLogLevelSchema>;
