/**
 * Identity Resolver
 *
 * Two identities exist and they are never interchangeable:
 *
 * - scopedIdentityKey(id, scope): one assignment of a definition at one
 *   archetype. Listings, selections and breakdown dedup use it, so the same
 *   initiative at two scopes is always two rows.
 * - definitionIdentityKey(id): the definition regardless of where it is
 *   assigned. Used for fetch memoization and per-definition summaries.
 *
 * Items sharing a scoped key are duplicates of one assignment reached through
 * two paths and collapse to a single row.
 *
 * @module resolution/identity
 */

import type {
  DefinitionIdentityKey,
  ResolvedCatalog,
  ResolvedInitiative,
  ResolvedPolicy,
  ResolutionFlag,
  ScopedIdentityKey,
  TargetKind,
} from '../core/types.js';

// ============================================================================
// Keys
// ============================================================================

/**
 * Scope-aware identity: (definition id, scope label)
 */
export function scopedIdentityKey(definitionId: string, scope: string): ScopedIdentityKey {
  return `scoped:${encodeURIComponent(definitionId)}|${encodeURIComponent(scope)}`;
}

/**
 * Scope-collapsing identity: definition id alone
 */
export function definitionIdentityKey(definitionId: string): DefinitionIdentityKey {
  return `definition:${encodeURIComponent(definitionId)}`;
}

export function initiativeKey(initiative: ResolvedInitiative): ScopedIdentityKey {
  return scopedIdentityKey(initiative.initiativeId, initiative.scope);
}

export function policyKey(policy: ResolvedPolicy): ScopedIdentityKey {
  return scopedIdentityKey(policy.policyId, policy.scope);
}

// ============================================================================
// Ordering
// ============================================================================

/**
 * Code-unit string comparison (locale independent)
 */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Compare by each extracted field in turn
 */
export function compareBy<T>(...fields: ReadonlyArray<(item: T) => string>): (a: T, b: T) => number {
  return (a, b) => {
    for (const field of fields) {
      const order = compareText(field(a), field(b));
      if (order !== 0) return order;
    }
    return 0;
  };
}

const initiativeOrder = compareBy<ResolvedInitiative>(
  (i) => i.scope,
  (i) => i.assignmentName,
  (i) => i.displayName,
  (i) => i.initiativeId
);

export const policyOrder = compareBy<ResolvedPolicy>(
  (p) => p.scope,
  (p) => p.assignmentName,
  (p) => p.displayName,
  (p) => p.policyId
);

// ============================================================================
// Duplicate Collapse
// ============================================================================

/**
 * Which occurrence survives when two items share a scoped key
 *
 * - richest: fewest resolution flags, earliest on ties
 * - first: earliest occurrence
 * - last: latest occurrence
 */
export const DUPLICATE_PREFERENCES = ['richest', 'first', 'last'] as const;

export type DuplicatePreference = (typeof DUPLICATE_PREFERENCES)[number];

/**
 * One collapsed duplicate
 */
export interface DuplicateRecord {
  readonly key: ScopedIdentityKey;
  readonly kind: TargetKind;
  readonly definitionId: string;
  readonly scope: string;
  /** Assignment name of the surviving occurrence */
  readonly kept: string;
  /** Assignment name of the discarded occurrence */
  readonly dropped: string;
}

export interface IdentityResolution {
  readonly catalog: ResolvedCatalog;
  readonly duplicates: readonly DuplicateRecord[];
}

interface Keyed {
  readonly scope: string;
  readonly assignmentName: string;
  readonly flags: readonly ResolutionFlag[];
}

function collapse<T extends Keyed>(
  items: readonly T[],
  kind: TargetKind,
  keyOf: (item: T) => ScopedIdentityKey,
  idOf: (item: T) => string,
  preference: DuplicatePreference,
  duplicates: DuplicateRecord[]
): T[] {
  const kept = new Map<ScopedIdentityKey, T>();

  for (const item of items) {
    const key = keyOf(item);
    const current = kept.get(key);
    if (current === undefined) {
      kept.set(key, item);
      continue;
    }

    const replace =
      preference === 'last' ||
      (preference === 'richest' && item.flags.length < current.flags.length);
    const survivor = replace ? item : current;
    const loser = replace ? current : item;

    kept.set(key, survivor);
    duplicates.push({
      key,
      kind,
      definitionId: idOf(item),
      scope: item.scope,
      kept: survivor.assignmentName,
      dropped: loser.assignmentName,
    });
  }

  return [...kept.values()];
}

/**
 * Collapse exact duplicates and order the listings
 *
 * Initiative members keep their definition order; the expanded-policy
 * listing follows the initiative listing.
 */
export function resolveIdentities(
  initiatives: readonly ResolvedInitiative[],
  directPolicies: readonly ResolvedPolicy[],
  preference: DuplicatePreference = 'richest'
): IdentityResolution {
  const duplicates: DuplicateRecord[] = [];

  const uniqueInitiatives = collapse(
    initiatives,
    'Initiative',
    initiativeKey,
    (i) => i.initiativeId,
    preference,
    duplicates
  ).sort(initiativeOrder);

  const uniquePolicies = collapse(
    directPolicies,
    'Policy',
    policyKey,
    (p) => p.policyId,
    preference,
    duplicates
  ).sort(policyOrder);

  return {
    catalog: {
      initiatives: uniqueInitiatives,
      directPolicies: uniquePolicies,
      initiativePolicies: uniqueInitiatives.flatMap((initiative) => initiative.members),
    },
    duplicates,
  };
}

// ============================================================================
// Per-definition Summary
// ============================================================================

/**
 * Where one definition is assigned, across scopes
 */
export interface DefinitionSummary {
  readonly key: DefinitionIdentityKey;
  readonly definitionId: string;
  readonly kind: TargetKind;
  readonly scopes: readonly string[];
}

/**
 * Group catalog listings by definition, collapsing scopes
 *
 * Expanded members count as assignments of their policy.
 */
export function summarizeByDefinition(catalog: ResolvedCatalog): DefinitionSummary[] {
  const groups = new Map<string, { definitionId: string; kind: TargetKind; scopes: Set<string> }>();

  const add = (kind: TargetKind, definitionId: string, scope: string): void => {
    const groupKey = `${kind}:${definitionIdentityKey(definitionId)}`;
    const group = groups.get(groupKey) ?? { definitionId, kind, scopes: new Set<string>() };
    group.scopes.add(scope);
    groups.set(groupKey, group);
  };

  for (const initiative of catalog.initiatives) {
    add('Initiative', initiative.initiativeId, initiative.scope);
  }
  for (const policy of [...catalog.directPolicies, ...catalog.initiativePolicies]) {
    add('Policy', policy.policyId, policy.scope);
  }

  return [...groups.values()]
    .map((group) => ({
      key: definitionIdentityKey(group.definitionId),
      definitionId: group.definitionId,
      kind: group.kind,
      scopes: [...group.scopes].sort(compareText),
    }))
    .sort(compareBy<DefinitionSummary>((s) => s.kind, (s) => s.definitionId));
}
