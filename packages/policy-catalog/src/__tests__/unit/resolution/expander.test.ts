/**
 * Initiative Expander Tests
 */

import { describe, it, expect } from 'vitest';

import { InconsistentMemberCount } from '../../../core/errors.js';
import type { Definition, TargetKind } from '../../../core/types.js';
import { expandInitiative, resolveDirectPolicy, type DefinitionLookup } from '../../../resolution/expander.js';
import {
  initiativeDefinition,
  initiativePath,
  makeAssignment,
  policyDefinition,
} from '../../utils/fixtures.js';

function lookupFrom(definitions: readonly Definition[]): DefinitionLookup {
  const byId = new Map(definitions.map((definition) => [definition.id, definition]));
  return async (definitionId: string, _kind: TargetKind) => byId.get(definitionId) ?? null;
}

const EFFECT_SCHEMA = {
  effect: { type: 'String', defaultValue: 'Audit' },
};

describe('expandInitiative', () => {
  it('should expand every member in definition order with parent details', async () => {
    const lookup = lookupFrom([
      initiativeDefinition('Deploy-MDFC-Config', [{ policyId: 'p-b' }, { policyId: 'p-a', referenceId: 'ref-a' }], {
        displayName: 'Deploy Defender',
      }),
      policyDefinition('p-a'),
      policyDefinition('p-b'),
    ]);
    const assignment = makeAssignment({
      name: 'Deploy-MDFC-Config',
      definitionId: 'Deploy-MDFC-Config',
      targetKind: 'Initiative',
      scope: 'root',
    });

    const { initiative, memberCountMismatch } = await expandInitiative(assignment, lookup);

    expect(memberCountMismatch).toBeNull();
    expect(initiative.displayName).toBe('Deploy Defender');
    expect(initiative.memberCount).toBe(2);
    expect(initiative.flags).toEqual([]);
    expect(initiative.members.map((m) => m.policyId)).toEqual(['p-b', 'p-a']);
    expect(initiative.members[1]).toMatchObject({
      referenceId: 'ref-a',
      scope: 'root',
      assignmentName: 'Deploy-MDFC-Config',
      parent: { initiativeId: 'Deploy-MDFC-Config', displayName: 'Deploy Defender' },
      effect: 'Audit',
      flags: [],
    });
  });

  it('should apply the initiative assignment override over the policy default', async () => {
    const lookup = lookupFrom([
      initiativeDefinition(
        'Bundle',
        [{ policyId: 'p1', parameters: { effect: "[parameters('bundleEffect')]" } }],
        { parameters: { bundleEffect: { type: 'String', defaultValue: 'AuditIfNotExists' } } }
      ),
      policyDefinition('p1', { effect: "[parameters('effect')]", parameters: EFFECT_SCHEMA }),
    ]);
    const assignment = makeAssignment({
      name: 'Bundle-Assignment',
      definitionId: 'Bundle',
      targetKind: 'Initiative',
      parameters: { bundleEffect: 'Deny' },
    });

    const { initiative } = await expandInitiative(assignment, lookup);

    expect(initiative.members[0].parameters).toEqual({ effect: 'Deny' });
    expect(initiative.members[0].effect).toBe('Deny');
  });

  it('should emit a flagged placeholder for a missing member and still count it', async () => {
    const lookup = lookupFrom([
      initiativeDefinition('Bundle', [{ policyId: 'present' }, { policyId: 'missing' }]),
      policyDefinition('present'),
    ]);
    const assignment = makeAssignment({ name: 'Bundle', definitionId: 'Bundle', targetKind: 'Initiative' });

    const { initiative } = await expandInitiative(assignment, lookup);

    expect(initiative.memberCount).toBe(2);
    expect(initiative.members[1]).toMatchObject({
      policyId: 'missing',
      displayName: 'missing',
      effect: '',
      flags: ['definition-not-found'],
      parent: { initiativeId: 'Bundle', displayName: 'Initiative Bundle' },
    });
  });

  it('should add unresolved-parameter to a placeholder whose reference cannot be satisfied', async () => {
    const lookup = lookupFrom([
      initiativeDefinition('Bundle', [
        { policyId: 'missing', parameters: { workspace: "[parameters('logAnalytics')]" } },
      ]),
    ]);
    const assignment = makeAssignment({ name: 'Bundle', definitionId: 'Bundle', targetKind: 'Initiative' });

    const { initiative } = await expandInitiative(assignment, lookup);

    expect(initiative.members[0].flags).toEqual(['definition-not-found', 'unresolved-parameter']);
    expect(initiative.members[0].unresolvedParameters).toEqual(['workspace']);
    expect(initiative.members[0].parameters).toEqual({ workspace: null });
  });

  it('should not expand a member that names a policy set', async () => {
    const calls: string[] = [];
    const inner = lookupFrom([initiativeDefinition('Outer', [{ policyId: 'Inner', path: initiativePath('Inner') }])]);
    const lookup: DefinitionLookup = async (id, kind) => {
      calls.push(id);
      return inner(id, kind);
    };
    const assignment = makeAssignment({ name: 'Outer', definitionId: 'Outer', targetKind: 'Initiative' });

    const { initiative } = await expandInitiative(assignment, lookup);

    expect(calls).toEqual(['Outer']);
    expect(initiative.members).toHaveLength(1);
    expect(initiative.members[0].flags).toEqual(['nested-initiative']);
  });

  it('should flag a member whose fetched definition is an initiative', async () => {
    const lookup = lookupFrom([
      initiativeDefinition('Outer', [{ policyId: 'Inner' }]),
      initiativeDefinition('Inner', [{ policyId: 'deep' }]),
      policyDefinition('deep'),
    ]);
    const assignment = makeAssignment({ name: 'Outer', definitionId: 'Outer', targetKind: 'Initiative' });

    const { initiative } = await expandInitiative(assignment, lookup);

    expect(initiative.members.map((m) => m.policyId)).toEqual(['Inner']);
    expect(initiative.members[0].flags).toEqual(['nested-initiative']);
  });

  it('should emit an empty flagged initiative when the definition is missing', async () => {
    const assignment = makeAssignment({
      name: 'Ghost',
      definitionId: 'Ghost-Set',
      targetKind: 'Initiative',
      scope: 'corp',
    });

    const { initiative } = await expandInitiative(assignment, lookupFrom([]));

    expect(initiative).toMatchObject({
      initiativeId: 'Ghost-Set',
      displayName: 'Ghost-Set',
      scope: 'corp',
      memberCount: 0,
      declaredMemberCount: 0,
      members: [],
      flags: ['definition-not-found'],
    });
  });

  it('should report a declared count that differs from the parsed members', async () => {
    const lookup = lookupFrom([
      initiativeDefinition('Partial', [{ policyId: 'p1' }], { declaredMemberCount: 3 }),
      policyDefinition('p1'),
    ]);
    const assignment = makeAssignment({ name: 'Partial', definitionId: 'Partial', targetKind: 'Initiative' });

    const { initiative, memberCountMismatch } = await expandInitiative(assignment, lookup);

    expect(memberCountMismatch).toBeInstanceOf(InconsistentMemberCount);
    expect(memberCountMismatch?.declared).toBe(3);
    expect(memberCountMismatch?.parsed).toBe(1);
    expect(initiative.memberCount).toBe(1);
    expect(initiative.declaredMemberCount).toBe(3);
    expect(initiative.flags).toEqual(['member-count-mismatch']);
  });

  it('should refuse a policy assignment', async () => {
    const assignment = makeAssignment({ name: 'Direct', definitionId: 'p1' });

    await expect(expandInitiative(assignment, lookupFrom([]))).rejects.toThrow('targets a policy');
  });
});

describe('resolveDirectPolicy', () => {
  it('should resolve a direct assignment with its overrides', async () => {
    const lookup = lookupFrom([
      policyDefinition('Deny-Public-IP', { effect: "[parameters('effect')]", parameters: EFFECT_SCHEMA }),
    ]);
    const assignment = makeAssignment({
      name: 'Deny-Public-IP',
      definitionId: 'Deny-Public-IP',
      scope: 'corp',
      parameters: { effect: 'Deny' },
    });

    const policy = await resolveDirectPolicy(assignment, lookup);

    expect(policy).toMatchObject({
      policyId: 'Deny-Public-IP',
      effect: 'Deny',
      parameters: { effect: 'Deny' },
      parameterNames: ['effect'],
      parent: null,
      referenceId: '',
      flags: [],
    });
  });

  it('should emit a placeholder when the definition is missing', async () => {
    const assignment = makeAssignment({ name: 'Lost', definitionId: 'lost-id', parameters: { effect: 'Deny' } });

    const policy = await resolveDirectPolicy(assignment, lookupFrom([]));

    expect(policy).toMatchObject({
      policyId: 'lost-id',
      displayName: 'lost-id',
      parameters: { effect: 'Deny' },
      flags: ['definition-not-found'],
    });
  });
});
