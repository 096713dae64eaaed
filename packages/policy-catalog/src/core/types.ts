/**
 * Policy Catalog Core Types
 *
 * Entities produced by one extraction run. Everything here is created fresh
 * per run and treated as immutable once constructed.
 *
 * @module core/types
 */

// ============================================================================
// Assignments
// ============================================================================

/**
 * What an assignment binds to a scope
 */
export type TargetKind = 'Policy' | 'Initiative';

/**
 * Assignment enforcement mode
 */
export type EnforcementMode = 'Default' | 'DoNotEnforce';

/**
 * Parameter name → concrete value
 */
export type ParameterValues = Readonly<Record<string, unknown>>;

/**
 * One declared binding of a definition to a scope (archetype)
 */
export interface Assignment {
  /** Assignment name, unique within a scope */
  readonly name: string;
  readonly displayName: string;
  readonly targetKind: TargetKind;
  /** Last segment of the target resource path (UUID or symbolic name) */
  readonly definitionId: string;
  /** Full target resource path as declared */
  readonly definitionPath: string;
  readonly enforcementMode: EnforcementMode;
  /** Archetype that declared the assignment */
  readonly scope: string;
  /** Override values, already unwrapped from `{ value }` envelopes */
  readonly parameters: ParameterValues;
  readonly sourceUrl: string;
}

// ============================================================================
// Definitions
// ============================================================================

/**
 * One entry of a definition's parameter schema
 */
export interface ParameterSchemaEntry {
  readonly type?: string;
  readonly defaultValue?: unknown;
  readonly allowedValues?: readonly unknown[];
  readonly displayName?: string;
}

export type ParameterSchema = Readonly<Record<string, ParameterSchemaEntry>>;

interface DefinitionBase {
  readonly id: string;
  readonly displayName: string;
  readonly description: string;
  readonly category: string;
  readonly version: string;
  /** BuiltIn, Custom, Static, ... (empty when unknown) */
  readonly policyType: string;
  readonly parameters: ParameterSchema;
}

/**
 * Policy definition
 */
export interface PolicyDefinition extends DefinitionBase {
  readonly kind: 'Policy';
  /**
   * Raw `policyRule.then.effect`. Either a literal effect, a parameter
   * reference expression, or undefined when the rule carries none.
   */
  readonly effectExpression: unknown;
}

/**
 * One member entry of an initiative definition
 */
export interface InitiativeMember {
  /** Member path as declared in the initiative */
  readonly policyDefinitionPath: string;
  /** Last segment of the member path */
  readonly policyId: string;
  readonly referenceId: string;
  /** Member parameter values: literals or `[parameters('x')]` references */
  readonly parameters: ParameterValues;
}

/**
 * Initiative (policy set) definition
 */
export interface InitiativeDefinition extends DefinitionBase {
  readonly kind: 'Initiative';
  readonly members: readonly InitiativeMember[];
  /** Count the document claims; differs from members.length when entries failed to parse */
  readonly declaredMemberCount: number;
}

export type Definition = PolicyDefinition | InitiativeDefinition;

// ============================================================================
// Resolved Entities
// ============================================================================

/**
 * Reasons a resolved row is incomplete
 */
export type ResolutionFlag =
  | 'definition-not-found'
  | 'nested-initiative'
  | 'unresolved-parameter'
  | 'member-count-mismatch';

/**
 * Parent initiative of an expanded policy
 */
export interface ParentInitiative {
  readonly initiativeId: string;
  readonly displayName: string;
}

/**
 * One concrete (policy, scope, parameter-set) instance
 */
export interface ResolvedPolicy {
  readonly policyId: string;
  readonly displayName: string;
  readonly description: string;
  readonly category: string;
  readonly version: string;
  readonly policyType: string;
  readonly effect: string;
  readonly scope: string;
  readonly assignmentName: string;
  readonly enforcementMode: EnforcementMode;
  /** Null for direct assignments */
  readonly parent: ParentInitiative | null;
  /** Member reference id inside the parent initiative ('' for direct) */
  readonly referenceId: string;
  readonly parameters: ParameterValues;
  /** Parameter names declared by the policy's own schema */
  readonly parameterNames: readonly string[];
  /** Member parameters whose reference could not be resolved */
  readonly unresolvedParameters: readonly string[];
  readonly flags: readonly ResolutionFlag[];
  readonly assignmentUrl: string;
}

/**
 * One concrete (initiative, scope) instance
 */
export interface ResolvedInitiative {
  readonly initiativeId: string;
  readonly displayName: string;
  readonly description: string;
  readonly category: string;
  readonly version: string;
  readonly policyType: string;
  readonly scope: string;
  readonly assignmentName: string;
  readonly enforcementMode: EnforcementMode;
  /** Always members.length */
  readonly memberCount: number;
  /** Count claimed by the definition document (0 when not found) */
  readonly declaredMemberCount: number;
  readonly members: readonly ResolvedPolicy[];
  readonly flags: readonly ResolutionFlag[];
  readonly assignmentUrl: string;
}

// ============================================================================
// Catalog & Selection
// ============================================================================

/**
 * Deduplicated listings produced by the identity resolver
 */
export interface ResolvedCatalog {
  readonly initiatives: readonly ResolvedInitiative[];
  readonly directPolicies: readonly ResolvedPolicy[];
  /** Members of `initiatives`, flattened in listing order */
  readonly initiativePolicies: readonly ResolvedPolicy[];
}

/**
 * Scope-aware identity of a resolved item: (definition id, scope)
 */
export type ScopedIdentityKey = `scoped:${string}|${string}`;

/**
 * Scope-collapsing identity of a definition
 */
export type DefinitionIdentityKey = `definition:${string}`;

/**
 * Which initiatives and direct policies feed the breakdown
 */
export interface SelectionSet {
  readonly initiatives: ReadonlySet<ScopedIdentityKey>;
  readonly policies: ReadonlySet<ScopedIdentityKey>;
}

/**
 * One row of the breakdown view
 */
export interface BreakdownRow {
  readonly policy: ResolvedPolicy;
  /** Every assignment through which the (policy, scope) pair was reached, sorted */
  readonly reachedVia: readonly string[];
}
