/**
 * Identity Resolver Tests
 */

import { describe, it, expect } from 'vitest';

import {
  definitionIdentityKey,
  resolveIdentities,
  scopedIdentityKey,
  summarizeByDefinition,
} from '../../../resolution/identity.js';
import { resolvedInitiative, resolvedPolicy } from '../../utils/fixtures.js';

describe('identity keys', () => {
  it('should encode identifier and scope', () => {
    expect(scopedIdentityKey('Deploy-MDFC-Config', 'root')).toBe('scoped:Deploy-MDFC-Config|root');
    expect(scopedIdentityKey('a|b', 'x y')).toBe('scoped:a%7Cb|x%20y');
    expect(definitionIdentityKey('a|b')).toBe('definition:a%7Cb');
  });

  it('should not let a separator in the identifier forge another key', () => {
    expect(scopedIdentityKey('a|b', 'c')).not.toBe(scopedIdentityKey('a', 'b|c'));
  });

  it('should distinguish scopes only in the scoped key', () => {
    expect(scopedIdentityKey('p1', 'root')).not.toBe(scopedIdentityKey('p1', 'corp'));
    expect(definitionIdentityKey('p1')).toBe(definitionIdentityKey('p1'));
  });
});

describe('resolveIdentities', () => {
  it('should keep the same initiative at two scopes as two listings', () => {
    const { catalog, duplicates } = resolveIdentities(
      [
        resolvedInitiative({ initiativeId: 'Deploy-MDFC-Config', scope: 'root' }, ['p1']),
        resolvedInitiative({ initiativeId: 'Deploy-MDFC-Config', scope: 'corp' }, ['p1']),
      ],
      []
    );

    expect(duplicates).toEqual([]);
    expect(catalog.initiatives.map((i) => i.scope)).toEqual(['corp', 'root']);
    expect(catalog.initiativePolicies.map((p) => `${p.policyId}@${p.scope}`)).toEqual(['p1@corp', 'p1@root']);
  });

  it('should collapse exact duplicates preferring the row with fewer flags', () => {
    const flagged = resolvedPolicy({ policyId: 'p1', assignmentName: 'A', flags: ['definition-not-found'] });
    const clean = resolvedPolicy({ policyId: 'p1', assignmentName: 'B' });

    const { catalog, duplicates } = resolveIdentities([], [flagged, clean]);

    expect(catalog.directPolicies).toEqual([clean]);
    expect(duplicates).toEqual([
      {
        key: 'scoped:p1|root',
        kind: 'Policy',
        definitionId: 'p1',
        scope: 'root',
        kept: 'B',
        dropped: 'A',
      },
    ]);
  });

  it('should keep the earliest occurrence on a tie under richest', () => {
    const first = resolvedPolicy({ policyId: 'p1', assignmentName: 'A' });
    const second = resolvedPolicy({ policyId: 'p1', assignmentName: 'B' });

    const { catalog } = resolveIdentities([], [first, second], 'richest');

    expect(catalog.directPolicies).toEqual([first]);
  });

  it('should honour first and last preferences', () => {
    const first = resolvedPolicy({ policyId: 'p1', assignmentName: 'A' });
    const second = resolvedPolicy({ policyId: 'p1', assignmentName: 'B', flags: ['unresolved-parameter'] });

    expect(resolveIdentities([], [first, second], 'first').catalog.directPolicies).toEqual([first]);
    expect(resolveIdentities([], [first, second], 'last').catalog.directPolicies).toEqual([second]);
  });

  it('should record initiative duplicates with their kind', () => {
    const { catalog, duplicates } = resolveIdentities(
      [
        resolvedInitiative({ initiativeId: 'Set', assignmentName: 'Set-A' }, ['p1']),
        resolvedInitiative({ initiativeId: 'Set', assignmentName: 'Set-B' }, ['p1']),
      ],
      []
    );

    expect(catalog.initiatives).toHaveLength(1);
    expect(catalog.initiativePolicies).toHaveLength(1);
    expect(duplicates[0]).toMatchObject({ kind: 'Initiative', kept: 'Set-A', dropped: 'Set-B' });
  });

  it('should order listings by scope, assignment, display name and id', () => {
    const { catalog } = resolveIdentities(
      [],
      [
        resolvedPolicy({ policyId: 'p3', scope: 'root', assignmentName: 'A' }),
        resolvedPolicy({ policyId: 'p2', scope: 'corp', assignmentName: 'Z' }),
        resolvedPolicy({ policyId: 'p1', scope: 'root', assignmentName: 'A' }),
      ]
    );

    expect(catalog.directPolicies.map((p) => p.policyId)).toEqual(['p2', 'p1', 'p3']);
  });

  it('should keep member order within an initiative', () => {
    const { catalog } = resolveIdentities([resolvedInitiative({ initiativeId: 'Set' }, ['z', 'a', 'm'])], []);

    expect(catalog.initiativePolicies.map((p) => p.policyId)).toEqual(['z', 'a', 'm']);
  });
});

describe('summarizeByDefinition', () => {
  it('should group scopes per definition and kind', () => {
    const { catalog } = resolveIdentities(
      [
        resolvedInitiative({ initiativeId: 'Set', scope: 'root' }, ['p1']),
        resolvedInitiative({ initiativeId: 'Set', scope: 'corp' }, ['p1']),
      ],
      [resolvedPolicy({ policyId: 'p1', scope: 'online' })]
    );

    expect(summarizeByDefinition(catalog)).toEqual([
      { key: 'definition:Set', definitionId: 'Set', kind: 'Initiative', scopes: ['corp', 'root'] },
      { key: 'definition:p1', definitionId: 'p1', kind: 'Policy', scopes: ['corp', 'online', 'root'] },
    ]);
  });
});
