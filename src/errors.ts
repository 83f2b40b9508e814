// ============================================
// RESOURCE KINDS
// ============================================

export type ResourceKind =
  | 'board'
  | 'list'
  | 'card'
  | 'checklist'
  | 'checkItem'
  | 'label'
  | 'comment'
  | 'action'
  | 'attachment'
  | 'customField'
  | 'customFieldOption'
  | 'member'
  | 'workspace'
  | 'webhook';

export interface ResourceRef {
  kind: ResourceKind;
  id?: string;
}

const RESOURCE_LABELS: Record<ResourceKind, string> = {
  board: 'Board',
  list: 'List',
  card: 'Card',
  checklist: 'Checklist',
  checkItem: 'Check item',
  label: 'Label',
  comment: 'Comment',
  action: 'Action',
  attachment: 'Attachment',
  customField: 'Custom field',
  customFieldOption: 'Custom field option',
  member: 'Member',
  workspace: 'Workspace',
  webhook: 'Webhook',
};

/** "Board '5f…'" when the id is known, "Board" otherwise. */
export function describeResource(resource: ResourceRef | undefined): string {
  if (!resource) return 'resource';
  const label = RESOURCE_LABELS[resource.kind];
  return resource.id ? `${label} '${resource.id}'` : label;
}

// ============================================
// CLASSIFIED ERRORS
// ============================================

export type ErrorKind =
  | 'NotFound'
  | 'Unauthorized'
  | 'Forbidden'
  | 'Validation'
  | 'RateLimit'
  | 'BadRequest'
  | 'Network'
  | 'Unknown';

export type MembershipLevel = 'observer' | 'normal' | 'admin';

export interface FieldViolation {
  field: string;
  message: string;
}

interface ErrorBase {
  message: string;
  resourceKind?: ResourceKind;
  resourceId?: string;
  status?: number;
}

export type ClassifiedError =
  | (ErrorBase & { kind: 'NotFound' })
  | (ErrorBase & { kind: 'Unauthorized' })
  | (ErrorBase & { kind: 'Forbidden'; requiredLevel?: MembershipLevel })
  | (ErrorBase & { kind: 'Validation'; violations: FieldViolation[] })
  | (ErrorBase & { kind: 'RateLimit'; retryAfterMs: number })
  | (ErrorBase & { kind: 'BadRequest' })
  | (ErrorBase & { kind: 'Network'; code: string; timedOut: boolean; cancelled: boolean })
  | (ErrorBase & { kind: 'Unknown'; body: string });

export type Result<T> = { ok: true; value: T } | { ok: false; error: ClassifiedError };

export type Failure = { ok: false; error: ClassifiedError };

/** Outcome of a pre-flight check: pass, or the error that stops the operation. */
export type ValidationOutcome = { ok: true } | Failure;

export const PASS: ValidationOutcome = Object.freeze({ ok: true });

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(error: ClassifiedError): Failure {
  return { ok: false, error };
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(value)}`);
}

export function resourceFields(resource: ResourceRef | undefined): Pick<ErrorBase, 'resourceKind' | 'resourceId'> {
  if (!resource) return {};
  return resource.id ? { resourceKind: resource.kind, resourceId: resource.id } : { resourceKind: resource.kind };
}

export function validationError(
  violations: FieldViolation[],
  resource?: ResourceRef
): ClassifiedError {
  const message = violations.map((v) => v.message).join('; ');
  return { kind: 'Validation', message, violations, ...resourceFields(resource) };
}

// ============================================
// TOOL BOUNDARY
// ============================================

function hintFor(error: ClassifiedError): string {
  switch (error.kind) {
    case 'NotFound':
      return 'Verify the ID and that your token has access to the resource';
    case 'Unauthorized':
      return 'Check TRELLO_API_KEY and TRELLO_TOKEN; the token may be expired or revoked';
    case 'Forbidden':
      return error.requiredLevel
        ? `This operation requires ${error.requiredLevel} membership`
        : 'Check your board or workspace permissions';
    case 'Validation':
      return 'Fix the listed fields and try again';
    case 'RateLimit':
      return 'Wait before retrying or reduce the request rate';
    case 'BadRequest':
      return 'Check the request parameters for correctness';
    case 'Network':
      return error.cancelled
        ? 'The request was cancelled before it completed'
        : 'Check your network connection and TRELLO_API_URL';
    case 'Unknown':
      return 'The Trello API returned an unexpected response. Try again later';
    default:
      return assertNever(error);
  }
}

/** Serializable error payload returned to the MCP host. */
export function toErrorPayload(error: ClassifiedError): Record<string, unknown> {
  const payload: Record<string, unknown> = {
    kind: error.kind,
    message: error.message,
  };
  if (error.resourceKind) payload.resource_kind = error.resourceKind;
  if (error.resourceId) payload.resource_id = error.resourceId;
  if (error.status !== undefined) payload.status = error.status;

  switch (error.kind) {
    case 'RateLimit':
      payload.retry_after_seconds = Math.ceil(error.retryAfterMs / 1000);
      break;
    case 'Validation':
      payload.violations = error.violations;
      break;
    case 'Forbidden':
      if (error.requiredLevel) payload.required_level = error.requiredLevel;
      break;
    case 'Network':
      payload.code = error.code;
      payload.timed_out = error.timedOut;
      payload.cancelled = error.cancelled;
      break;
    case 'NotFound':
    case 'Unauthorized':
    case 'BadRequest':
    case 'Unknown':
      break;
    default:
      return assertNever(error);
  }

  payload.hint = hintFor(error);
  return payload;
}

export function mapResult<T, U>(result: Result<T>, fn: (value: T) => U): Result<U> {
  return result.ok ? ok(fn(result.value)) : result;
}
