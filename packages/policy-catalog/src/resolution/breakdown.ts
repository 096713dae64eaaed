/**
 * Breakdown Composer
 *
 * Builds the cross-scope "Policy Breakdown" view from a resolved catalog and
 * the analyst's selection. Pure: no fetches, no clock, no locale.
 *
 * @module resolution/breakdown
 */

import type {
  BreakdownRow,
  ResolvedCatalog,
  ResolvedPolicy,
  ScopedIdentityKey,
  SelectionSet,
} from '../core/types.js';
import { compareText, initiativeKey, policyKey, policyOrder } from './identity.js';

export interface BreakdownResult {
  readonly rows: readonly BreakdownRow[];
  /** Selected initiative keys that matched no initiative listing */
  readonly unmatchedInitiatives: readonly ScopedIdentityKey[];
  /** Selected policy keys that matched no direct policy listing */
  readonly unmatchedPolicies: readonly ScopedIdentityKey[];
}

// ============================================================================
// Selection
// ============================================================================

export function emptySelection(): SelectionSet {
  return { initiatives: new Set(), policies: new Set() };
}

/**
 * Every initiative and direct policy listed in the catalog
 */
export function selectAll(catalog: ResolvedCatalog): SelectionSet {
  return {
    initiatives: new Set(catalog.initiatives.map(initiativeKey)),
    policies: new Set(catalog.directPolicies.map(policyKey)),
  };
}

export function selectionFromKeys(
  initiatives: Iterable<ScopedIdentityKey>,
  policies: Iterable<ScopedIdentityKey>
): SelectionSet {
  return { initiatives: new Set(initiatives), policies: new Set(policies) };
}

// ============================================================================
// Composition
// ============================================================================

/**
 * Representative order among candidates sharing a key
 *
 * Fewest flags, then a direct assignment before an initiative member, then
 * the smallest assignment name.
 */
function preferCandidate(a: ResolvedPolicy, b: ResolvedPolicy): number {
  if (a.flags.length !== b.flags.length) {
    return a.flags.length - b.flags.length;
  }
  const aDirect = a.parent === null ? 0 : 1;
  const bDirect = b.parent === null ? 0 : 1;
  if (aDirect !== bDirect) {
    return aDirect - bDirect;
  }
  return compareText(a.assignmentName, b.assignmentName);
}

/**
 * Compose the breakdown for a selection
 *
 * Rows are the union of the members of selected initiatives and the selected
 * direct policies, one per (policy id, scope).
 */
export function composeBreakdown(catalog: ResolvedCatalog, selection: SelectionSet): BreakdownResult {
  const candidates: ResolvedPolicy[] = [];
  const matchedInitiatives = new Set<ScopedIdentityKey>();
  const matchedPolicies = new Set<ScopedIdentityKey>();

  for (const initiative of catalog.initiatives) {
    const key = initiativeKey(initiative);
    if (!selection.initiatives.has(key)) continue;
    matchedInitiatives.add(key);
    candidates.push(...initiative.members);
  }

  for (const policy of catalog.directPolicies) {
    const key = policyKey(policy);
    if (!selection.policies.has(key)) continue;
    matchedPolicies.add(key);
    candidates.push(policy);
  }

  const groups = new Map<ScopedIdentityKey, ResolvedPolicy[]>();
  for (const candidate of candidates) {
    const key = policyKey(candidate);
    const group = groups.get(key);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(key, [candidate]);
    }
  }

  const rows: BreakdownRow[] = [];
  for (const group of groups.values()) {
    const [representative] = [...group].sort(preferCandidate);
    const reachedVia = [...new Set(group.map((p) => p.assignmentName))].sort(compareText);
    rows.push({ policy: representative, reachedVia });
  }
  rows.sort((a, b) => policyOrder(a.policy, b.policy));

  return {
    rows,
    unmatchedInitiatives: [...selection.initiatives].filter((k) => !matchedInitiatives.has(k)).sort(compareText),
    unmatchedPolicies: [...selection.policies].filter((k) => !matchedPolicies.has(k)).sort(compareText),
  };
}
