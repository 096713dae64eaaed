/**
 * Test Fixture Factories
 *
 * Builders for raw documents, definitions and assignments. Each factory
 * creates a minimal valid object; tests override only what they exercise.
 */

import type {
  Assignment,
  InitiativeDefinition,
  InitiativeMember,
  ParameterSchema,
  ParameterValues,
  PolicyDefinition,
  ResolvedInitiative,
  ResolvedPolicy,
} from '../../core/types.js';
import type { RawAssignmentRecord } from '../../providers/types.js';

// ============================================================================
// Resource Paths
// ============================================================================

export function policyPath(id: string): string {
  return `/providers/Microsoft.Authorization/policyDefinitions/${id}`;
}

export function initiativePath(id: string): string {
  return `/providers/Microsoft.Authorization/policySetDefinitions/${id}`;
}

// ============================================================================
// Raw Assignment Documents
// ============================================================================

export interface AssignmentDocumentOptions {
  readonly displayName?: string;
  readonly enforcementMode?: string;
  /** Plain values; wrapped in `{ value }` envelopes */
  readonly parameters?: Readonly<Record<string, unknown>>;
  readonly targetKind?: string;
}

/**
 * ARM policy assignment document as the library declares it
 */
export function assignmentDocument(
  name: string,
  definitionPath: string,
  options: AssignmentDocumentOptions = {}
): Record<string, unknown> {
  const parameters: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(options.parameters ?? {})) {
    parameters[key] = { value };
  }

  return {
    type: 'Microsoft.Authorization/policyAssignments',
    name,
    ...(options.targetKind !== undefined ? { targetKind: options.targetKind } : {}),
    properties: {
      displayName: options.displayName ?? `${name} assignment`,
      policyDefinitionId: definitionPath,
      enforcementMode: options.enforcementMode ?? 'Default',
      parameters,
    },
  };
}

export function assignmentRecord(
  referenceName: string,
  document: unknown,
  sourceUrl = `https://example.test/assignments/${referenceName}.json`
): RawAssignmentRecord {
  return { referenceName, document, sourceUrl };
}

// ============================================================================
// Definitions
// ============================================================================

export interface PolicyDefinitionOptions {
  readonly displayName?: string;
  readonly effect?: unknown;
  readonly parameters?: ParameterSchema;
  readonly category?: string;
  readonly version?: string;
}

export function policyDefinition(id: string, options: PolicyDefinitionOptions = {}): PolicyDefinition {
  return {
    kind: 'Policy',
    id,
    displayName: options.displayName ?? `Policy ${id}`,
    description: `Description of ${id}`,
    category: options.category ?? 'General',
    version: options.version ?? '1.0.0',
    policyType: 'BuiltIn',
    parameters: options.parameters ?? {},
    effectExpression: 'effect' in options ? options.effect : 'Audit',
  };
}

export interface MemberSpec {
  readonly policyId: string;
  readonly referenceId?: string;
  readonly parameters?: ParameterValues;
  /** Member path (default: policy definition path of policyId) */
  readonly path?: string;
}

export interface InitiativeDefinitionOptions {
  readonly displayName?: string;
  readonly parameters?: ParameterSchema;
  readonly declaredMemberCount?: number;
}

export function initiativeMember(member: MemberSpec): InitiativeMember {
  return {
    policyDefinitionPath: member.path ?? policyPath(member.policyId),
    policyId: member.policyId,
    referenceId: member.referenceId ?? member.policyId,
    parameters: member.parameters ?? {},
  };
}

export function initiativeDefinition(
  id: string,
  members: readonly MemberSpec[],
  options: InitiativeDefinitionOptions = {}
): InitiativeDefinition {
  return {
    kind: 'Initiative',
    id,
    displayName: options.displayName ?? `Initiative ${id}`,
    description: `Description of ${id}`,
    category: 'Security Center',
    version: '2.0.0',
    policyType: 'Custom',
    parameters: options.parameters ?? {},
    members: members.map(initiativeMember),
    declaredMemberCount: options.declaredMemberCount ?? members.length,
  };
}

// ============================================================================
// Assignments
// ============================================================================

export function makeAssignment(overrides: Partial<Assignment> & Pick<Assignment, 'name' | 'definitionId'>): Assignment {
  const targetKind = overrides.targetKind ?? 'Policy';
  return {
    displayName: overrides.name,
    targetKind,
    definitionPath:
      targetKind === 'Initiative' ? initiativePath(overrides.definitionId) : policyPath(overrides.definitionId),
    enforcementMode: 'Default',
    scope: 'root',
    parameters: {},
    sourceUrl: `https://example.test/assignments/${overrides.name}.json`,
    ...overrides,
  };
}

// ============================================================================
// Resolved Rows
// ============================================================================

export function resolvedPolicy(
  overrides: Partial<ResolvedPolicy> & Pick<ResolvedPolicy, 'policyId'>
): ResolvedPolicy {
  return {
    displayName: `Policy ${overrides.policyId}`,
    description: '',
    category: 'General',
    version: '1.0.0',
    policyType: 'BuiltIn',
    effect: 'Audit',
    scope: 'root',
    assignmentName: `Assign-${overrides.policyId}`,
    enforcementMode: 'Default',
    parent: null,
    referenceId: '',
    parameters: {},
    parameterNames: [],
    unresolvedParameters: [],
    flags: [],
    assignmentUrl: `https://example.test/assignments/${overrides.policyId}.json`,
    ...overrides,
  };
}

/**
 * Resolved initiative whose members are attached to it as parent
 */
export function resolvedInitiative(
  overrides: Partial<Omit<ResolvedInitiative, 'members' | 'memberCount'>> &
    Pick<ResolvedInitiative, 'initiativeId'>,
  memberIds: readonly string[] = []
): ResolvedInitiative {
  const scope = overrides.scope ?? 'root';
  const assignmentName = overrides.assignmentName ?? overrides.initiativeId;
  const displayName = overrides.displayName ?? `Initiative ${overrides.initiativeId}`;
  const members = memberIds.map((policyId) =>
    resolvedPolicy({
      policyId,
      scope,
      assignmentName,
      referenceId: policyId,
      parent: { initiativeId: overrides.initiativeId, displayName },
    })
  );

  return {
    description: '',
    category: 'Security Center',
    version: '2.0.0',
    policyType: 'Custom',
    enforcementMode: 'Default',
    declaredMemberCount: members.length,
    flags: [],
    assignmentUrl: `https://example.test/assignments/${assignmentName}.json`,
    ...overrides,
    scope,
    assignmentName,
    displayName,
    members,
    memberCount: members.length,
  };
}
