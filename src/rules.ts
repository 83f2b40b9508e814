// ============================================
// PATTERNS AND ENUMERATIONS
// ============================================

export const HEX_ID = /^[a-f0-9]{24}$/;
export const SHORT_NAME = /^[a-z0-9_]{3,}$/;
export const MEMBER_REF = /^(me|[a-z0-9_]{3,}|[a-f0-9]{24})$/;
export const WORKSPACE_REF = /^([a-f0-9]{24}|[a-z0-9_]{3,})$/;

export const HEX_ID_HINT = 'Expected a 24-character hexadecimal ID';
export const SHORT_NAME_HINT =
  'Must be at least 3 characters and contain only lowercase letters, numbers and underscores';

export const PERMISSION_LEVELS = ['private', 'org', 'public'] as const;
export const VOTING_PERMISSIONS = ['disabled', 'members', 'observers', 'org', 'public'] as const;
export const COMMENT_PERMISSIONS = ['disabled', 'members', 'observers', 'org', 'public'] as const;
export const LABEL_COLORS = [
  'yellow',
  'purple',
  'blue',
  'red',
  'green',
  'orange',
  'black',
  'sky',
  'pink',
  'lime',
] as const;
export const BOARD_FILTERS = ['all', 'open', 'closed', 'members', 'organization', 'public', 'starred'] as const;
export const LIST_FILTERS = ['all', 'open', 'closed'] as const;
export const CARD_FILTERS = ['all', 'open', 'closed', 'visible'] as const;
export const MEMBER_TYPES = ['admin', 'normal', 'observer'] as const;
export const CHECK_ITEM_STATES = ['complete', 'incomplete'] as const;
export const CUSTOM_FIELD_TYPES = ['text', 'number', 'date', 'checkbox', 'list'] as const;
export const OPTION_COLORS = [...LABEL_COLORS, 'none'] as const;
export const CARD_ACTION_FILTERS = ['all', 'commentCard', 'updateCard', 'createCard', 'addAttachmentToCard', 'addMemberToCard'] as const;
export const SEARCH_MODEL_TYPES = ['actions', 'boards', 'cards', 'members', 'organizations', 'all'] as const;

export const NAME_MAX = 16384;
export const DESC_MAX = 16384;
export const CARD_NAME_MAX = 16384;
export const COMMENT_MAX = 16384;
export const WEBHOOK_DESC_MAX = 16384;
export const CUSTOM_FIELD_NAME_MAX = 255;
export const BATCH_MAX_URLS = 10;
export const MEMBER_SEARCH_MAX = 20;

// ============================================
// RULE TABLES
// ============================================

export type Constraint =
  | { type: 'required' }
  | { type: 'kind'; of: 'string' | 'number' | 'boolean' | 'array' }
  | { type: 'length'; min?: number; max?: number }
  | { type: 'oneOf'; values: readonly string[] }
  | { type: 'pattern'; pattern: RegExp; description: string }
  | { type: 'url' }
  | { type: 'range'; min?: number; max?: number }
  | { type: 'date' }
  | { type: 'count'; min?: number; max?: number };

export interface FieldRule {
  field: string;
  constraint: Constraint;
}

export type RuleSet = readonly FieldRule[];

const required = (field: string): FieldRule => ({ field, constraint: { type: 'required' } });

const length = (field: string, min: number | undefined, max: number | undefined): FieldRule => ({
  field,
  constraint: { type: 'length', min, max },
});

const oneOf = (field: string, values: readonly string[]): FieldRule => ({
  field,
  constraint: { type: 'oneOf', values },
});

const hexId = (field: string): FieldRule => ({
  field,
  constraint: { type: 'pattern', pattern: HEX_ID, description: HEX_ID_HINT },
});

const url = (field: string): FieldRule => ({ field, constraint: { type: 'url' } });

/** Presence plus format for a 24-hex id field. */
export const idRules = (...fields: string[]): FieldRule[] =>
  fields.flatMap((field) => [required(field), hexId(field)]);

const optionalIds = (...fields: string[]): FieldRule[] => fields.map(hexId);

export const rules = {
  boardId: idRules('board_id'),
  listId: idRules('list_id'),
  cardId: idRules('card_id'),
  checklistId: idRules('checklist_id'),
  labelId: idRules('label_id'),
  commentId: idRules('comment_id'),
  webhookId: idRules('webhook_id'),

  workspaceRef: [
    required('workspace_id'),
    {
      field: 'workspace_id',
      constraint: { type: 'pattern', pattern: WORKSPACE_REF, description: 'Expected a workspace ID or short name' },
    },
  ],

  memberRef: [
    required('member_id'),
    {
      field: 'member_id',
      constraint: { type: 'pattern', pattern: MEMBER_REF, description: 'Expected "me", a username or a member ID' },
    },
  ],

  listBoards: [oneOf('filter', BOARD_FILTERS)],

  createBoard: [
    required('name'),
    length('name', 1, NAME_MAX),
    length('desc', undefined, DESC_MAX),
    ...optionalIds('id_organization', 'id_board_source'),
    oneOf('permission_level', PERMISSION_LEVELS),
    oneOf('voting', VOTING_PERMISSIONS),
    oneOf('comments', COMMENT_PERMISSIONS),
  ],

  updateBoard: [
    ...idRules('board_id'),
    length('name', 1, NAME_MAX),
    length('desc', undefined, DESC_MAX),
    ...optionalIds('id_organization'),
    oneOf('permission_level', PERMISSION_LEVELS),
  ],

  createLabel: [
    ...idRules('board_id'),
    required('name'),
    length('name', 1, NAME_MAX),
    required('color'),
    oneOf('color', LABEL_COLORS),
  ],

  updateLabel: [...idRules('label_id'), length('name', 1, NAME_MAX), oneOf('color', LABEL_COLORS)],

  boardLists: [...idRules('board_id'), oneOf('filter', LIST_FILTERS)],

  createList: [...idRules('board_id'), required('name'), length('name', 1, NAME_MAX)],

  updateList: [...idRules('list_id'), length('name', 1, NAME_MAX), ...optionalIds('id_board')],

  listCards: [...idRules('list_id'), oneOf('filter', CARD_FILTERS)],

  createCard: [
    ...idRules('list_id'),
    required('name'),
    length('name', 1, CARD_NAME_MAX),
    length('desc', undefined, DESC_MAX),
    { field: 'due', constraint: { type: 'date' } },
    { field: 'id_members', constraint: { type: 'count', max: 100 } },
    { field: 'id_labels', constraint: { type: 'count', max: 100 } },
  ],

  updateCard: [
    ...idRules('card_id'),
    length('name', 1, CARD_NAME_MAX),
    length('desc', undefined, DESC_MAX),
    ...optionalIds('id_list', 'id_board'),
    { field: 'due', constraint: { type: 'date' } },
  ],

  moveCard: [...idRules('card_id', 'list_id'), ...optionalIds('board_id')],

  setDueDate: [
    ...idRules('card_id'),
    { field: 'due', constraint: { type: 'date' } },
  ],

  createChecklist: [...idRules('card_id'), required('name'), length('name', 1, NAME_MAX)],

  addCheckItem: [
    ...idRules('checklist_id'),
    required('name'),
    length('name', 1, NAME_MAX),
  ],

  updateCheckItem: [
    ...idRules('card_id', 'checkitem_id'),
    length('name', 1, NAME_MAX),
    oneOf('state', CHECK_ITEM_STATES),
  ],

  deleteCheckItem: idRules('checklist_id', 'checkitem_id'),

  cardLabel: idRules('card_id', 'label_id'),

  addComment: [...idRules('card_id'), required('text'), length('text', 1, COMMENT_MAX)],

  updateComment: [...idRules('comment_id'), required('text'), length('text', 1, COMMENT_MAX)],

  attachUrl: [...idRules('card_id'), required('url'), url('url'), length('name', 1, 256)],

  deleteAttachment: idRules('card_id', 'attachment_id'),

  addBoardMember: [
    ...idRules('board_id'),
    required('email'),
    {
      field: 'email',
      constraint: { type: 'pattern', pattern: /^[^\s@]+@[^\s@]+\.[^\s@]+$/, description: 'Expected an email address' },
    },
    oneOf('member_type', MEMBER_TYPES),
    length('full_name', 1, 256),
  ],

  boardMember: [...idRules('board_id', 'member_id')],

  updateBoardMember: [...idRules('board_id', 'member_id'), required('member_type'), oneOf('member_type', MEMBER_TYPES)],

  cardMember: idRules('card_id', 'member_id'),

  createWebhook: [
    required('callback_url'),
    url('callback_url'),
    ...idRules('id_model'),
    length('description', undefined, WEBHOOK_DESC_MAX),
  ],

  updateWebhook: [
    ...idRules('webhook_id'),
    url('callback_url'),
    ...optionalIds('id_model'),
    length('description', undefined, WEBHOOK_DESC_MAX),
  ],

  createWorkspace: [
    required('display_name'),
    length('display_name', 1, NAME_MAX),
    length('desc', undefined, DESC_MAX),
    { field: 'name', constraint: { type: 'pattern', pattern: SHORT_NAME, description: SHORT_NAME_HINT } },
    url('website'),
  ],

  updateWorkspace: [
    required('workspace_id'),
    { field: 'workspace_id', constraint: { type: 'pattern', pattern: WORKSPACE_REF, description: 'Expected a workspace ID or short name' } },
    length('display_name', 1, NAME_MAX),
    length('desc', undefined, DESC_MAX),
    { field: 'name', constraint: { type: 'pattern', pattern: SHORT_NAME, description: SHORT_NAME_HINT } },
    url('website'),
  ],

  search: [
    required('query'),
    length('query', 1, 16384),
    { field: 'model_types', constraint: { type: 'kind', of: 'array' } },
    { field: 'limit', constraint: { type: 'range', min: 1, max: 1000 } },
    ...optionalIds('board_id'),
  ],

  batch: [
    required('urls'),
    { field: 'urls', constraint: { type: 'count', min: 1, max: BATCH_MAX_URLS } },
  ],

  searchMembers: [
    required('query'),
    length('query', 1, 16384),
    { field: 'limit', constraint: { type: 'range', min: 1, max: MEMBER_SEARCH_MAX } },
    ...optionalIds('board_id', 'workspace_id'),
  ],

  cardActions: [
    ...idRules('card_id'),
    oneOf('filter', CARD_ACTION_FILTERS),
    { field: 'limit', constraint: { type: 'range', min: 1, max: 1000 } },
  ],

  attachmentCover: idRules('card_id', 'attachment_id'),

  cardVote: idRules('card_id', 'member_id'),

  setStartDate: [...idRules('card_id'), { field: 'start', constraint: { type: 'date' } }],

  setDueComplete: [...idRules('card_id'), required('complete')],

  createFromTemplate: [
    ...idRules('template_board_id'),
    required('name'),
    length('name', 1, NAME_MAX),
    ...optionalIds('id_organization'),
    oneOf('permission_level', PERMISSION_LEVELS),
  ],

  customFieldId: idRules('field_id'),

  createCustomField: [
    ...idRules('board_id'),
    required('name'),
    length('name', 1, CUSTOM_FIELD_NAME_MAX),
    required('field_type'),
    oneOf('field_type', CUSTOM_FIELD_TYPES),
    { field: 'options', constraint: { type: 'count', min: 1, max: 50 } },
  ],

  updateCustomField: [...idRules('field_id'), length('name', 1, CUSTOM_FIELD_NAME_MAX)],

  addCustomFieldOption: [
    ...idRules('field_id'),
    required('text'),
    length('text', 1, CUSTOM_FIELD_NAME_MAX),
    oneOf('color', OPTION_COLORS),
  ],

  updateCustomFieldOption: [
    ...idRules('field_id', 'option_id'),
    length('text', 1, CUSTOM_FIELD_NAME_MAX),
    oneOf('color', OPTION_COLORS),
  ],

  customFieldOption: idRules('field_id', 'option_id'),

  setCustomFieldText: [...idRules('card_id', 'field_id'), required('text'), length('text', undefined, DESC_MAX)],

  setCustomFieldNumber: [
    ...idRules('card_id', 'field_id'),
    required('number'),
    { field: 'number', constraint: { type: 'kind', of: 'number' } },
  ],

  setCustomFieldDate: [...idRules('card_id', 'field_id'), required('date'), { field: 'date', constraint: { type: 'date' } }],

  setCustomFieldCheckbox: [...idRules('card_id', 'field_id'), required('checked')],

  setCustomFieldList: idRules('card_id', 'field_id', 'option_id'),
} satisfies Record<string, RuleSet>;
