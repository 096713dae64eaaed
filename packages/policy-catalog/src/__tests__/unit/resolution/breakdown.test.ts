/**
 * Breakdown Composer Tests
 */

import { describe, it, expect } from 'vitest';

import type { ResolvedCatalog, ScopedIdentityKey } from '../../../core/types.js';
import {
  composeBreakdown,
  emptySelection,
  selectAll,
  selectionFromKeys,
} from '../../../resolution/breakdown.js';
import { resolveIdentities, scopedIdentityKey } from '../../../resolution/identity.js';
import { resolvedInitiative, resolvedPolicy } from '../../utils/fixtures.js';

function buildCatalog(): ResolvedCatalog {
  return resolveIdentities(
    [
      resolvedInitiative({ initiativeId: 'I1', scope: 'root' }, ['p1', 'p2']),
      resolvedInitiative({ initiativeId: 'I2', scope: 'root' }, ['p2', 'p3']),
      resolvedInitiative({ initiativeId: 'I1', scope: 'corp' }, ['p1', 'p2']),
    ],
    [resolvedPolicy({ policyId: 'p2', scope: 'root', assignmentName: 'Direct-p2' })]
  ).catalog;
}

const I1_ROOT = scopedIdentityKey('I1', 'root');
const I2_ROOT = scopedIdentityKey('I2', 'root');
const I1_CORP = scopedIdentityKey('I1', 'corp');
const P2_ROOT = scopedIdentityKey('p2', 'root');

function rowKeys(
  catalog: ResolvedCatalog,
  initiatives: ScopedIdentityKey[],
  policies: ScopedIdentityKey[] = []
): string[] {
  const selection = selectionFromKeys(initiatives, policies);
  return composeBreakdown(catalog, selection).rows.map((row) => `${row.policy.policyId}@${row.policy.scope}`);
}

describe('composeBreakdown', () => {
  it('should return no rows for an empty selection', () => {
    const result = composeBreakdown(buildCatalog(), emptySelection());

    expect(result.rows).toEqual([]);
    expect(result.unmatchedInitiatives).toEqual([]);
    expect(result.unmatchedPolicies).toEqual([]);
  });

  it('should emit one row per policy within a scope across overlapping initiatives', () => {
    const result = composeBreakdown(buildCatalog(), selectionFromKeys([I1_ROOT, I2_ROOT], []));

    expect(result.rows.map((row) => row.policy.policyId)).toEqual(['p1', 'p2', 'p3']);
    const p2 = result.rows[1];
    expect(p2.reachedVia).toEqual(['I1', 'I2']);
    expect(p2.policy.assignmentName).toBe('I1');
  });

  it('should keep a policy reached at two scopes as two rows', () => {
    const result = composeBreakdown(buildCatalog(), selectionFromKeys([I1_ROOT, I1_CORP], []));

    expect(result.rows.map((row) => `${row.policy.policyId}@${row.policy.scope}`)).toEqual([
      'p1@corp',
      'p2@corp',
      'p1@root',
      'p2@root',
    ]);
  });

  it('should list a policy once per scope when a direct assignment and an initiative reach it', () => {
    const catalog = resolveIdentities(
      [resolvedInitiative({ initiativeId: 'INIT-1', scope: 's2' }, ['POL-1'])],
      [resolvedPolicy({ policyId: 'POL-1', scope: 's1' })]
    ).catalog;
    const direct = scopedIdentityKey('POL-1', 's1');
    const initiative = scopedIdentityKey('INIT-1', 's2');

    const both = composeBreakdown(catalog, selectionFromKeys([initiative], [direct]));

    expect(both.rows.map((row) => [row.policy.scope, row.policy.parent?.initiativeId ?? null, row.reachedVia])).toEqual([
      ['s1', null, ['Assign-POL-1']],
      ['s2', 'INIT-1', ['INIT-1']],
    ]);
    expect(rowKeys(catalog, [], [direct])).toEqual(['POL-1@s1']);
  });

  it('should prefer a direct assignment as the representative', () => {
    const result = composeBreakdown(buildCatalog(), selectionFromKeys([I1_ROOT, I2_ROOT], [P2_ROOT]));

    const p2 = result.rows.find((row) => row.policy.policyId === 'p2');
    expect(p2?.policy.parent).toBeNull();
    expect(p2?.policy.assignmentName).toBe('Direct-p2');
    expect(p2?.reachedVia).toEqual(['Direct-p2', 'I1', 'I2']);
    expect(result.rows).toHaveLength(3);
  });

  it('should prefer a representative with fewer flags', () => {
    const flaggedMember = resolvedInitiative({ initiativeId: 'A-Set' }, ['shared']);
    const flagged = {
      ...flaggedMember,
      members: flaggedMember.members.map((member) => ({
        ...member,
        flags: ['unresolved-parameter' as const],
      })),
    };
    const { catalog } = resolveIdentities([flagged, resolvedInitiative({ initiativeId: 'B-Set' }, ['shared'])], []);

    const result = composeBreakdown(catalog, selectAll(catalog));

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0].policy.assignmentName).toBe('B-Set');
    expect(result.rows[0].reachedVia).toEqual(['A-Set', 'B-Set']);
  });

  it('should ignore a direct policy that is not selected', () => {
    expect(rowKeys(buildCatalog(), [I2_ROOT])).toEqual(['p2@root', 'p3@root']);
  });

  it('should report selections that match nothing', () => {
    const missingInitiative = scopedIdentityKey('I1', 'online');
    const missingPolicy = scopedIdentityKey('p9', 'root');

    const result = composeBreakdown(buildCatalog(), selectionFromKeys([I1_ROOT, missingInitiative], [missingPolicy]));

    expect(result.unmatchedInitiatives).toEqual([missingInitiative]);
    expect(result.unmatchedPolicies).toEqual([missingPolicy]);
    expect(result.rows).toHaveLength(2);
  });

  it('should not depend on selection or listing order', () => {
    const catalog = buildCatalog();
    const reversed: ResolvedCatalog = {
      initiatives: [...catalog.initiatives].reverse(),
      directPolicies: [...catalog.directPolicies].reverse(),
      initiativePolicies: [...catalog.initiativePolicies].reverse(),
    };

    const forward = composeBreakdown(catalog, selectionFromKeys([I1_ROOT, I2_ROOT, I1_CORP], [P2_ROOT]));
    const backward = composeBreakdown(reversed, selectionFromKeys([I1_CORP, I2_ROOT, I1_ROOT], [P2_ROOT]));

    expect(backward).toEqual(forward);
  });
});

describe('selectAll', () => {
  it('should select every initiative and direct policy listing', () => {
    const selection = selectAll(buildCatalog());

    expect([...selection.initiatives].sort()).toEqual([I1_CORP, I1_ROOT, I2_ROOT].sort());
    expect([...selection.policies]).toEqual([P2_ROOT]);
  });
});
