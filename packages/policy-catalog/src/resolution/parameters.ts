/**
 * Parameter Merge Semantics
 *
 * Effective parameters are layered, lowest precedence first:
 *
 *   direct assignment:   policy schema defaults → assignment overrides
 *   initiative member:   policy schema defaults
 *                        → member values declared in the initiative, where
 *                          `[parameters('x')]` takes the initiative default for x
 *                        → initiative-assignment override for x
 *
 * Parameter names compare case-insensitively, as ARM does. The result never
 * contains an unevaluated `[parameters(...)]` reference: a reference nothing
 * can satisfy falls back to the policy default, else null, and is reported.
 *
 * @module resolution/parameters
 */

import { PARAMETERIZED_EFFECT, UNKNOWN_EFFECT } from '../core/constants.js';
import { isRecord } from '../core/type-guards.js';
import type {
  InitiativeMember,
  ParameterSchema,
  ParameterValues,
  PolicyDefinition,
} from '../core/types.js';

const PARAMETER_REFERENCE = /^\[\s*parameters\(\s*(?:'([^']+)'|"([^"]+)")\s*\)\s*\]$/i;

/**
 * Unwrap ARM `{ "value": v }` parameter envelopes
 *
 * Entries without an envelope are kept as given.
 */
export function unwrapParameterValues(
  parameters: Readonly<Record<string, unknown>> | undefined
): ParameterValues {
  const values: Record<string, unknown> = {};
  if (!parameters) {
    return values;
  }

  for (const [name, entry] of Object.entries(parameters)) {
    values[name] = isRecord(entry) && 'value' in entry ? entry.value : entry;
  }
  return values;
}

/**
 * Name referenced by a `[parameters('name')]` expression, or null
 *
 * `[[...` is an escaped literal, never a reference.
 */
export function parseParameterReference(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  if (trimmed.startsWith('[[')) {
    return null;
  }
  const match = PARAMETER_REFERENCE.exec(trimmed);
  if (!match) {
    return null;
  }
  return (match[1] ?? match[2]).trim();
}

/**
 * Strip the escape from a `[[literal]` string
 */
export function unescapeLiteral(value: unknown): unknown {
  if (typeof value === 'string' && value.trimStart().startsWith('[[')) {
    return value.trimStart().slice(1);
  }
  return value;
}

/**
 * Key of `map` matching `name` case-insensitively
 */
export function findParameterKey(
  map: Readonly<Record<string, unknown>>,
  name: string
): string | undefined {
  if (Object.hasOwn(map, name)) {
    return name;
  }
  const lowered = name.toLowerCase();
  return Object.keys(map).find((key) => key.toLowerCase() === lowered);
}

/**
 * Declared defaults of a parameter schema
 */
export function schemaDefaults(schema: ParameterSchema): Record<string, unknown> {
  const defaults: Record<string, unknown> = {};
  for (const [name, entry] of Object.entries(schema)) {
    if (entry.defaultValue !== undefined) {
      defaults[name] = entry.defaultValue;
    }
  }
  return defaults;
}

/**
 * Effective parameters of a directly assigned policy
 *
 * Override keys the schema does not declare are kept as given.
 */
export function resolveDirectParameters(
  policySchema: ParameterSchema,
  overrides: ParameterValues
): ParameterValues {
  const values = schemaDefaults(policySchema);
  for (const [name, value] of Object.entries(overrides)) {
    values[findParameterKey(values, name) ?? findParameterKey(policySchema, name) ?? name] = value;
  }
  return values;
}

/**
 * Outcome of resolving one initiative member's parameters
 */
export interface MemberParameterResolution {
  readonly values: ParameterValues;
  /** Member parameter names whose reference nothing could satisfy */
  readonly unresolved: readonly string[];
}

/**
 * Effective parameters of one initiative member
 *
 * @param policySchema - The member policy's own schema ({} when not found)
 * @param member - Member entry declared by the initiative
 * @param initiativeSchema - The initiative's parameter schema
 * @param overrides - Initiative assignment overrides, keyed by initiative parameter name
 */
export function resolveMemberParameters(
  policySchema: ParameterSchema,
  member: InitiativeMember,
  initiativeSchema: ParameterSchema,
  overrides: ParameterValues
): MemberParameterResolution {
  const values = schemaDefaults(policySchema);
  const unresolved: string[] = [];

  for (const [name, declared] of Object.entries(member.parameters)) {
    const key = findParameterKey(values, name) ?? findParameterKey(policySchema, name) ?? name;
    const reference = parseParameterReference(declared);

    if (reference === null) {
      values[key] = unescapeLiteral(declared);
      continue;
    }

    const overrideKey = findParameterKey(overrides, reference);
    if (overrideKey !== undefined) {
      values[key] = overrides[overrideKey];
      continue;
    }

    const initiativeKey = findParameterKey(initiativeSchema, reference);
    const initiativeDefault =
      initiativeKey !== undefined ? initiativeSchema[initiativeKey].defaultValue : undefined;
    if (initiativeDefault !== undefined) {
      values[key] = initiativeDefault;
      continue;
    }

    // Nothing satisfies the reference: keep the policy default if there is one
    if (!Object.hasOwn(values, key)) {
      values[key] = null;
      unresolved.push(name);
    }
  }

  return { values, unresolved };
}

/**
 * Display effect of a policy under its effective parameters
 *
 * A literal effect is returned as written; a `[parameters('x')]` effect
 * resolves through the effective parameters.
 */
export function resolveEffect(definition: PolicyDefinition, effective: ParameterValues): string {
  const expression = definition.effectExpression;
  if (expression === undefined) {
    return '';
  }
  if (typeof expression !== 'string') {
    return UNKNOWN_EFFECT;
  }

  const reference = parseParameterReference(expression);
  if (reference === null) {
    const literal = unescapeLiteral(expression);
    return typeof literal === 'string' ? literal : UNKNOWN_EFFECT;
  }

  const key = findParameterKey(effective, reference);
  const value = key !== undefined ? effective[key] : undefined;
  return typeof value === 'string' && value.length > 0 ? value : PARAMETERIZED_EFFECT;
}
