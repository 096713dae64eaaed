/**
 * Initiative Expander
 *
 * Resolves an initiative assignment into one ResolvedPolicy per member, and a
 * direct policy assignment into a single ResolvedPolicy.
 *
 * Expansion is exactly one level deep. Initiatives do not nest in this model,
 * so a member that names a policy set (by path, or by the document fetched
 * for it) becomes a placeholder flagged `nested-initiative` and is never
 * expanded further. Changing that is a change to this module's contract.
 *
 * Missing definitions never drop a row: the initiative or member is emitted
 * as a placeholder flagged `definition-not-found`, and member counts include
 * placeholders.
 *
 * @module resolution/expander
 */

import { InconsistentMemberCount } from '../core/errors.js';
import { inferKindFromPath } from '../core/resource-path.js';
import type {
  Assignment,
  Definition,
  InitiativeDefinition,
  InitiativeMember,
  ParameterValues,
  ParentInitiative,
  PolicyDefinition,
  ResolutionFlag,
  ResolvedInitiative,
  ResolvedPolicy,
  TargetKind,
} from '../core/types.js';
import {
  resolveDirectParameters,
  resolveEffect,
  resolveMemberParameters,
} from './parameters.js';

/**
 * Definition lookup: null means not found
 */
export type DefinitionLookup = (definitionId: string, kind: TargetKind) => Promise<Definition | null>;

/**
 * Result of expanding one initiative assignment
 */
export interface InitiativeExpansion {
  readonly initiative: ResolvedInitiative;
  /** Set when the definition's declared member count differs from its parsed members */
  readonly memberCountMismatch: InconsistentMemberCount | null;
}

// ============================================================================
// Builders
// ============================================================================

/**
 * Fields of a ResolvedInitiative other than its members and count
 */
export type InitiativeHeader = Omit<ResolvedInitiative, 'members' | 'memberCount'>;

/**
 * Assemble a ResolvedInitiative; the member count is always derived from members
 */
export function buildResolvedInitiative(
  header: InitiativeHeader,
  members: readonly ResolvedPolicy[]
): ResolvedInitiative {
  return { ...header, members, memberCount: members.length };
}

interface PolicyRowContext {
  readonly assignment: Assignment;
  readonly parent: ParentInitiative | null;
  readonly referenceId: string;
}

function resolvedPolicyRow(
  context: PolicyRowContext,
  definition: PolicyDefinition,
  parameters: ParameterValues,
  flags: readonly ResolutionFlag[],
  unresolvedParameters: readonly string[]
): ResolvedPolicy {
  return {
    policyId: definition.id,
    displayName: definition.displayName,
    description: definition.description,
    category: definition.category,
    version: definition.version,
    policyType: definition.policyType,
    effect: resolveEffect(definition, parameters),
    scope: context.assignment.scope,
    assignmentName: context.assignment.name,
    enforcementMode: context.assignment.enforcementMode,
    parent: context.parent,
    referenceId: context.referenceId,
    parameters,
    parameterNames: Object.keys(definition.parameters),
    unresolvedParameters,
    flags,
    assignmentUrl: context.assignment.sourceUrl,
  };
}

/**
 * Row for a policy whose definition could not be used
 *
 * The identifier doubles as the display name.
 */
export function placeholderPolicy(
  context: PolicyRowContext,
  policyId: string,
  parameters: ParameterValues,
  flags: readonly ResolutionFlag[],
  unresolvedParameters: readonly string[] = []
): ResolvedPolicy {
  return {
    policyId,
    displayName: policyId,
    description: '',
    category: '',
    version: '',
    policyType: '',
    effect: '',
    scope: context.assignment.scope,
    assignmentName: context.assignment.name,
    enforcementMode: context.assignment.enforcementMode,
    parent: context.parent,
    referenceId: context.referenceId,
    parameters,
    parameterNames: [],
    unresolvedParameters,
    flags,
    assignmentUrl: context.assignment.sourceUrl,
  };
}

// ============================================================================
// Direct Policies
// ============================================================================

/**
 * Resolve a policy assignment
 */
export async function resolveDirectPolicy(
  assignment: Assignment,
  lookup: DefinitionLookup
): Promise<ResolvedPolicy> {
  const context: PolicyRowContext = { assignment, parent: null, referenceId: '' };
  const definition = await lookup(assignment.definitionId, 'Policy');

  if (definition === null || definition.kind !== 'Policy') {
    return placeholderPolicy(
      context,
      assignment.definitionId,
      resolveDirectParameters({}, assignment.parameters),
      ['definition-not-found']
    );
  }

  const parameters = resolveDirectParameters(definition.parameters, assignment.parameters);
  return resolvedPolicyRow(context, definition, parameters, [], []);
}

// ============================================================================
// Initiatives
// ============================================================================

/**
 * Expand an initiative assignment into its member policies
 */
export async function expandInitiative(
  assignment: Assignment,
  lookup: DefinitionLookup
): Promise<InitiativeExpansion> {
  if (assignment.targetKind !== 'Initiative') {
    throw new Error(`Assignment '${assignment.name}' targets a policy, not an initiative`);
  }

  const header: InitiativeHeader = {
    initiativeId: assignment.definitionId,
    displayName: assignment.definitionId,
    description: '',
    category: '',
    version: '',
    policyType: '',
    scope: assignment.scope,
    assignmentName: assignment.name,
    enforcementMode: assignment.enforcementMode,
    declaredMemberCount: 0,
    flags: ['definition-not-found'],
    assignmentUrl: assignment.sourceUrl,
  };

  const definition = await lookup(assignment.definitionId, 'Initiative');
  if (definition === null || definition.kind !== 'Initiative') {
    return { initiative: buildResolvedInitiative(header, []), memberCountMismatch: null };
  }

  const parent: ParentInitiative = {
    initiativeId: definition.id,
    displayName: definition.displayName,
  };

  const members: ResolvedPolicy[] = [];
  for (const member of definition.members) {
    members.push(await resolveMember(assignment, definition, member, parent, lookup));
  }

  const mismatch =
    definition.declaredMemberCount !== definition.members.length
      ? new InconsistentMemberCount(
          definition.id,
          definition.declaredMemberCount,
          definition.members.length
        )
      : null;

  const initiative = buildResolvedInitiative(
    {
      ...header,
      displayName: definition.displayName,
      description: definition.description,
      category: definition.category,
      version: definition.version,
      policyType: definition.policyType,
      declaredMemberCount: definition.declaredMemberCount,
      flags: mismatch ? ['member-count-mismatch'] : [],
    },
    members
  );

  return { initiative, memberCountMismatch: mismatch };
}

async function resolveMember(
  assignment: Assignment,
  initiative: InitiativeDefinition,
  member: InitiativeMember,
  parent: ParentInitiative,
  lookup: DefinitionLookup
): Promise<ResolvedPolicy> {
  const context: PolicyRowContext = { assignment, parent, referenceId: member.referenceId };

  // Single-level rule: a policy set member is never fetched or expanded
  if (inferKindFromPath(member.policyDefinitionPath) === 'Initiative') {
    return memberPlaceholder(context, initiative, member, 'nested-initiative');
  }

  const definition = await lookup(member.policyId, 'Policy');
  if (definition === null) {
    return memberPlaceholder(context, initiative, member, 'definition-not-found');
  }
  if (definition.kind === 'Initiative') {
    return memberPlaceholder(context, initiative, member, 'nested-initiative');
  }

  const { values, unresolved } = resolveMemberParameters(
    definition.parameters,
    member,
    initiative.parameters,
    context.assignment.parameters
  );
  return resolvedPolicyRow(
    context,
    definition,
    values,
    unresolved.length > 0 ? ['unresolved-parameter'] : [],
    unresolved
  );
}

function memberPlaceholder(
  context: PolicyRowContext,
  initiative: InitiativeDefinition,
  member: InitiativeMember,
  reason: ResolutionFlag
): ResolvedPolicy {
  const { values, unresolved } = resolveMemberParameters(
    {},
    member,
    initiative.parameters,
    context.assignment.parameters
  );
  const flags: ResolutionFlag[] = [reason];
  if (unresolved.length > 0) {
    flags.push('unresolved-parameter');
  }
  return placeholderPolicy(context, member.policyId, values, flags, unresolved);
}
