/**
 * Parameter Merge Tests
 */

import { describe, it, expect } from 'vitest';

import type { ParameterSchema } from '../../../core/types.js';
import {
  parseParameterReference,
  resolveDirectParameters,
  resolveEffect,
  resolveMemberParameters,
  unwrapParameterValues,
} from '../../../resolution/parameters.js';
import { initiativeMember, policyDefinition } from '../../utils/fixtures.js';

const EFFECT_SCHEMA: ParameterSchema = {
  effect: { type: 'String', defaultValue: 'Audit', allowedValues: ['Audit', 'Deny', 'Disabled'] },
};

describe('unwrapParameterValues', () => {
  it('should unwrap value envelopes and keep bare values', () => {
    expect(
      unwrapParameterValues({
        effect: { value: 'Deny' },
        list: { value: ['a', 'b'] },
        bare: 5,
      })
    ).toEqual({ effect: 'Deny', list: ['a', 'b'], bare: 5 });
  });

  it('should return an empty object for undefined', () => {
    expect(unwrapParameterValues(undefined)).toEqual({});
  });
});

describe('parseParameterReference', () => {
  it('should read single and double quoted references', () => {
    expect(parseParameterReference("[parameters('effect')]")).toBe('effect');
    expect(parseParameterReference('[parameters("logAnalytics")]')).toBe('logAnalytics');
    expect(parseParameterReference(" [ Parameters( 'x' ) ] ")).toBe('x');
  });

  it('should not treat escaped literals or other values as references', () => {
    expect(parseParameterReference("[[parameters('effect')]")).toBeNull();
    expect(parseParameterReference('Deny')).toBeNull();
    expect(parseParameterReference(42)).toBeNull();
    expect(parseParameterReference("[concat('a', 'b')]")).toBeNull();
  });
});

describe('resolveDirectParameters', () => {
  it('should let the assignment override the policy default', () => {
    expect(resolveDirectParameters(EFFECT_SCHEMA, { effect: 'Deny' })).toEqual({ effect: 'Deny' });
  });

  it('should keep defaults without overrides', () => {
    expect(resolveDirectParameters(EFFECT_SCHEMA, {})).toEqual({ effect: 'Audit' });
  });

  it('should match override names case-insensitively', () => {
    expect(resolveDirectParameters(EFFECT_SCHEMA, { Effect: 'Disabled' })).toEqual({ effect: 'Disabled' });
  });

  it('should keep an override named like an Object member', () => {
    expect(resolveDirectParameters({}, { constructor: 'Deny' })).toEqual({ constructor: 'Deny' });
  });

  it('should keep override keys the schema does not declare', () => {
    expect(resolveDirectParameters(EFFECT_SCHEMA, { extra: 1 })).toEqual({ effect: 'Audit', extra: 1 });
  });
});

describe('resolveMemberParameters', () => {
  const initiativeSchema: ParameterSchema = {
    initiativeEffect: { type: 'String', defaultValue: 'AuditIfNotExists' },
    workspaceId: { type: 'String' },
  };

  it('should prefer the initiative assignment override over the initiative default', () => {
    const member = initiativeMember({
      policyId: 'p1',
      parameters: { effect: "[parameters('initiativeEffect')]" },
    });

    const result = resolveMemberParameters(EFFECT_SCHEMA, member, initiativeSchema, {
      initiativeEffect: 'Deny',
    });

    expect(result).toEqual({ values: { effect: 'Deny' }, unresolved: [] });
  });

  it('should fall back to the initiative default', () => {
    const member = initiativeMember({
      policyId: 'p1',
      parameters: { effect: "[parameters('initiativeEffect')]" },
    });

    const result = resolveMemberParameters(EFFECT_SCHEMA, member, initiativeSchema, {});

    expect(result.values).toEqual({ effect: 'AuditIfNotExists' });
  });

  it('should let a literal member value replace the policy default', () => {
    const member = initiativeMember({ policyId: 'p1', parameters: { effect: 'Disabled' } });

    expect(resolveMemberParameters(EFFECT_SCHEMA, member, {}, {}).values).toEqual({ effect: 'Disabled' });
  });

  it('should unescape literal bracket values', () => {
    const member = initiativeMember({ policyId: 'p1', parameters: { pattern: "[[concat('a')]" } });

    expect(resolveMemberParameters({}, member, {}, {}).values).toEqual({ pattern: "[concat('a')]" });
  });

  it('should keep the policy default when a reference has no value', () => {
    const member = initiativeMember({
      policyId: 'p1',
      parameters: { effect: "[parameters('workspaceId')]" },
    });

    const result = resolveMemberParameters(EFFECT_SCHEMA, member, initiativeSchema, {});

    expect(result).toEqual({ values: { effect: 'Audit' }, unresolved: [] });
  });

  it('should report a reference nothing satisfies and store null', () => {
    const member = initiativeMember({
      policyId: 'p1',
      parameters: { logAnalytics: "[parameters('workspaceId')]" },
    });

    const result = resolveMemberParameters({}, member, initiativeSchema, {});

    expect(result).toEqual({ values: { logAnalytics: null }, unresolved: ['logAnalytics'] });
  });

  it('should report a parameter named like an Object member as unresolved', () => {
    const member = initiativeMember({
      policyId: 'p1',
      parameters: { toString: "[parameters('workspaceId')]" },
    });

    const result = resolveMemberParameters({}, member, initiativeSchema, {});

    expect(result).toEqual({ values: { toString: null }, unresolved: ['toString'] });
  });

  it('should never leave an unevaluated reference in the result', () => {
    const member = initiativeMember({
      policyId: 'p1',
      parameters: {
        a: "[parameters('initiativeEffect')]",
        b: "[parameters('missing')]",
        c: 'literal',
      },
    });

    const { values } = resolveMemberParameters({}, member, initiativeSchema, {});

    for (const value of Object.values(values)) {
      expect(parseParameterReference(value)).toBeNull();
    }
  });
});

describe('resolveEffect', () => {
  it('should return a literal effect as written', () => {
    expect(resolveEffect(policyDefinition('p', { effect: 'DeployIfNotExists' }), {})).toBe('DeployIfNotExists');
  });

  it('should resolve a referenced effect through the effective parameters', () => {
    const definition = policyDefinition('p', {
      effect: "[parameters('effect')]",
      parameters: EFFECT_SCHEMA,
    });

    expect(resolveEffect(definition, { effect: 'Deny' })).toBe('Deny');
    expect(resolveEffect(definition, { Effect: 'Disabled' })).toBe('Disabled');
  });

  it('should report Parameterized when the reference has no value', () => {
    const definition = policyDefinition('p', { effect: "[parameters('effect')]" });

    expect(resolveEffect(definition, {})).toBe('Parameterized');
    expect(resolveEffect(definition, { effect: null })).toBe('Parameterized');
  });

  it('should report Unknown for a non-string effect and nothing when absent', () => {
    expect(resolveEffect(policyDefinition('p', { effect: { nested: true } }), {})).toBe('Unknown');
    expect(resolveEffect(policyDefinition('p', { effect: undefined }), {})).toBe('');
  });
});
