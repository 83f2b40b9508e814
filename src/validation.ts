import { z } from 'zod';
import {
  PASS,
  assertNever,
  describeResource,
  fail,
  validationError,
  type ClassifiedError,
  type FieldViolation,
  type MembershipLevel,
  type ResourceKind,
  type ResourceRef,
  type ValidationOutcome,
} from './errors.js';
import { HEX_ID, HEX_ID_HINT, MEMBER_REF, WORKSPACE_REF, type Constraint, type FieldRule, type RuleSet } from './rules.js';
import { logger } from './logging/index.js';
import type { TrelloClient } from './trello-client.js';

// ============================================
// SHAPE VALIDATION (no network)
// ============================================

export interface ShapeOptions {
  /** 'first' stops at the first violation; 'all' collects every field's first violation. */
  report?: 'first' | 'all';
  resource?: ResourceRef;
}

const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value));

const display = (value: unknown): string => (typeof value === 'string' ? value : JSON.stringify(value));

function checkConstraint(field: string, value: unknown, constraint: Constraint): string | null {
  if (constraint.type === 'required') {
    return value === undefined || value === null ? `${field} is required` : null;
  }

  // Optional fields are only checked when present
  if (value === undefined || value === null) return null;

  switch (constraint.type) {
    case 'kind': {
      const actual = Array.isArray(value) ? 'array' : typeof value;
      return actual === constraint.of ? null : `${field} must be of type ${constraint.of}`;
    }

    case 'length': {
      if (typeof value !== 'string') return `${field} must be a string`;
      const { min, max } = constraint;
      const tooShort = min !== undefined && value.length < min;
      const tooLong = max !== undefined && value.length > max;
      if (!tooShort && !tooLong) return null;
      if (min !== undefined && max !== undefined) return `${field} must be between ${min} and ${max} characters`;
      return min !== undefined ? `${field} must be at least ${min} characters` : `${field} must be at most ${max} characters`;
    }

    case 'oneOf':
      return typeof value === 'string' && constraint.values.includes(value)
        ? null
        : `Invalid ${field} '${display(value)}'. Must be one of: ${constraint.values.join(', ')}`;

    case 'pattern':
      return typeof value === 'string' && constraint.pattern.test(value)
        ? null
        : `Invalid ${field} '${display(value)}'. ${constraint.description}`;

    case 'url':
      return HttpUrlSchema.safeParse(value).success
        ? null
        : `Invalid ${field} '${display(value)}'. Must be a valid HTTP or HTTPS URL`;

    case 'range': {
      if (typeof value !== 'number' || Number.isNaN(value)) return `${field} must be a number`;
      const { min, max } = constraint;
      if (min !== undefined && value < min) return `${field} must be at least ${min}`;
      if (max !== undefined && value > max) return `${field} must be at most ${max}`;
      return null;
    }

    case 'date':
      return typeof value === 'string' && !Number.isNaN(Date.parse(value))
        ? null
        : `Invalid ${field} '${display(value)}'. Expected an ISO-8601 date`;

    case 'count': {
      if (!Array.isArray(value)) return `${field} must be a list`;
      const { min, max } = constraint;
      if (min !== undefined && value.length < min) return `${field} must contain at least ${min} items`;
      if (max !== undefined && value.length > max) return `${field} must contain at most ${max} items`;
      return null;
    }

    default:
      return assertNever(constraint);
  }
}

/**
 * Checks a payload against a rule table. Pure: issues no request.
 * Rules run in table order; a field stops at its first failing rule.
 */
export function shapeValid(
  payload: Readonly<Record<string, unknown>>,
  rules: RuleSet,
  options: ShapeOptions = {}
): ValidationOutcome {
  const violations: FieldViolation[] = [];
  const failed = new Set<string>();

  for (const rule of rules) {
    if (failed.has(rule.field)) continue;
    const message = checkConstraint(rule.field, payload[rule.field], rule.constraint);
    if (message === null) continue;

    violations.push({ field: rule.field, message });
    failed.add(rule.field);
    if (options.report !== 'all') break;
  }

  return violations.length === 0 ? PASS : fail(validationError(violations, options.resource));
}

// ============================================
// PRE-FLIGHT
// ============================================

export type PreflightCheck = () => ValidationOutcome | Promise<ValidationOutcome>;

/** Runs checks in order and stops at the first failure. */
export async function runPreflight(checks: readonly PreflightCheck[]): Promise<ValidationOutcome> {
  for (const check of checks) {
    const outcome = await check();
    if (!outcome.ok) return outcome;
  }
  return PASS;
}

// ============================================
// REMOTE CHECKS
// ============================================

export type ExistenceKind = Exclude<ResourceKind, 'checkItem' | 'attachment' | 'customFieldOption'>;
export type PermissionScope = 'board' | 'workspace';

const RESOURCE_PATHS: Record<ExistenceKind, string> = {
  board: '/boards',
  list: '/lists',
  card: '/cards',
  checklist: '/checklists',
  label: '/labels',
  comment: '/actions',
  action: '/actions',
  customField: '/customFields',
  member: '/members',
  workspace: '/organizations',
  webhook: '/webhooks',
};

const SCOPE_PATHS: Record<PermissionScope, string> = {
  board: '/boards',
  workspace: '/organizations',
};

const LEVEL_RANK: Record<MembershipLevel, number> = {
  observer: 0,
  normal: 1,
  admin: 2,
};

function idPatternFor(kind: ExistenceKind): { pattern: RegExp; hint: string } {
  switch (kind) {
    case 'member':
      return { pattern: MEMBER_REF, hint: 'Expected "me", a username or a member ID' };
    case 'workspace':
      return { pattern: WORKSPACE_REF, hint: 'Expected a workspace ID or short name' };
    default:
      return { pattern: HEX_ID, hint: HEX_ID_HINT };
  }
}

const MemberIdSchema = z.object({ id: z.string() });

const MembershipListSchema = z.array(
  z.object({
    idMember: z.string(),
    memberType: z.string(),
    deactivated: z.boolean().optional(),
  })
);

function toLevel(memberType: string): MembershipLevel | undefined {
  return memberType === 'admin' || memberType === 'normal' || memberType === 'observer' ? memberType : undefined;
}

function forbidden(resource: ResourceRef, requiredLevel: MembershipLevel, detail: string): ClassifiedError {
  return {
    kind: 'Forbidden',
    message: `Permission denied for ${describeResource(resource)}: ${requiredLevel} access required (${detail}).`,
    requiredLevel,
    status: 403,
    resourceKind: resource.kind,
    ...(resource.id ? { resourceId: resource.id } : {}),
  };
}

export class ValidationService {
  constructor(private readonly client: TrelloClient) {}

  shapeValid(payload: Readonly<Record<string, unknown>>, rules: RuleSet, options?: ShapeOptions): ValidationOutcome {
    return shapeValid(payload, rules, options);
  }

  /** Minimal read of the resource (`fields=id`). Never mutates. */
  async resourceExists(kind: ExistenceKind, id: string, signal?: AbortSignal): Promise<ValidationOutcome> {
    const resource: ResourceRef = { kind, id };
    const { pattern, hint } = idPatternFor(kind);
    if (!pattern.test(id)) {
      return fail(
        validationError([{ field: 'id', message: `Invalid ${kind} ID format '${id}'. ${hint}` }], resource)
      );
    }

    const result = await this.client.get(`${RESOURCE_PATHS[kind]}/${encodeURIComponent(id)}`, {
      query: { fields: 'id' },
      resource,
      signal,
    });

    if (!result.ok) {
      logger.debug('Existence check failed', { kind, id, error: result.error.kind }, 'validation');
      return result;
    }
    return PASS;
  }

  /**
   * Checks the caller's membership on a board or workspace against the
   * required level (observer < normal < admin).
   */
  async hasPermission(
    scope: PermissionScope,
    id: string,
    requiredLevel: MembershipLevel,
    signal?: AbortSignal
  ): Promise<ValidationOutcome> {
    const resource: ResourceRef = { kind: scope, id };

    const me = await this.client.get('/members/me', {
      query: { fields: 'id' },
      resource: { kind: 'member', id: 'me' },
      schema: MemberIdSchema,
      signal,
    });
    if (!me.ok) return me;

    const memberships = await this.client.get(`${SCOPE_PATHS[scope]}/${encodeURIComponent(id)}/memberships`, {
      query: { filter: 'all' },
      resource,
      schema: MembershipListSchema,
      signal,
    });

    if (!memberships.ok) {
      if (memberships.error.kind === 'Forbidden') {
        return fail(forbidden(resource, requiredLevel, 'membership could not be read'));
      }
      return memberships;
    }

    const membership = memberships.value.find((m) => m.idMember === me.value.id && !m.deactivated);
    if (!membership) {
      return fail(forbidden(resource, requiredLevel, 'you are not a member'));
    }

    const level = toLevel(membership.memberType);
    if (!level || LEVEL_RANK[level] < LEVEL_RANK[requiredLevel]) {
      return fail(forbidden(resource, requiredLevel, `current role: ${membership.memberType}`));
    }

    return PASS;
  }
}
