/**
 * Assignment Classifier
 *
 * Turns one raw assignment record into a typed Assignment. The resource path
 * of the target decides the kind when it names a resource type; an explicit
 * `targetKind` discriminator covers bare identifiers. A bare identifier with
 * no discriminator is a policy.
 *
 * @module resolution/classifier
 */

import { ClassificationError } from '../core/errors.js';
import { extractDefinitionId, inferKindFromPath } from '../core/resource-path.js';
import { isNonEmptyString } from '../core/type-guards.js';
import type { Assignment, EnforcementMode, TargetKind } from '../core/types.js';
import type { RawAssignmentRecord } from '../providers/types.js';
import { RawAssignmentDocumentSchema, formatIssues } from '../schemas/raw-documents.js';
import { unwrapParameterValues } from './parameters.js';

/**
 * Parse an explicit discriminator value
 *
 * @returns The kind, or null when the value is not recognised
 */
export function parseTargetKind(value: string): TargetKind | null {
  switch (value.trim().toLowerCase()) {
    case 'policy':
    case 'policydefinition':
      return 'Policy';
    case 'initiative':
    case 'policyset':
    case 'policysetdefinition':
      return 'Initiative';
    default:
      return null;
  }
}

/**
 * `DoNotEnforce` (any case) or `Default`
 */
export function normalizeEnforcementMode(value: string | undefined): EnforcementMode {
  return value?.trim().toLowerCase() === 'donotenforce' ? 'DoNotEnforce' : 'Default';
}

/**
 * Classify one raw assignment declared by `scope`
 *
 * @throws {ClassificationError} When no policy or initiative target can be determined
 */
export function classifyAssignment(record: RawAssignmentRecord, scope: string): Assignment {
  if (record.document === null || record.document === undefined) {
    throw new ClassificationError(scope, record.referenceName, 'assignment document not found');
  }

  const parsed = RawAssignmentDocumentSchema.safeParse(record.document);
  if (!parsed.success) {
    throw new ClassificationError(
      scope,
      record.referenceName,
      `malformed assignment document (${formatIssues(parsed.error).join('; ')})`
    );
  }

  const document = parsed.data;
  const name = isNonEmptyString(document.name) ? document.name.trim() : record.referenceName.trim();
  if (name.length === 0) {
    throw new ClassificationError(scope, '', 'assignment has no name');
  }

  const properties = document.properties;
  const definitionPath = properties?.policyDefinitionId?.trim() ?? '';
  if (definitionPath.length === 0) {
    throw new ClassificationError(scope, name, 'missing policyDefinitionId');
  }

  const definitionId = extractDefinitionId(definitionPath);
  if (definitionId.length === 0) {
    throw new ClassificationError(scope, name, `no identifier in '${definitionPath}'`);
  }

  const targetKind = resolveTargetKind(scope, name, definitionPath, document.targetKind);
  const displayName = properties?.displayName;

  return {
    name,
    displayName: isNonEmptyString(displayName) ? displayName : name,
    targetKind,
    definitionId,
    definitionPath,
    enforcementMode: normalizeEnforcementMode(properties?.enforcementMode),
    scope,
    parameters: unwrapParameterValues(properties?.parameters),
    sourceUrl: record.sourceUrl,
  };
}

/**
 * Reconcile the path shape with the explicit discriminator
 */
function resolveTargetKind(
  scope: string,
  name: string,
  definitionPath: string,
  discriminator: string | undefined
): TargetKind {
  const fromPath = inferKindFromPath(definitionPath);

  if (discriminator === undefined) {
    return fromPath ?? 'Policy';
  }

  const declared = parseTargetKind(discriminator);
  if (declared === null) {
    throw new ClassificationError(scope, name, `unknown target kind '${discriminator}'`);
  }
  if (fromPath !== null && fromPath !== declared) {
    throw new ClassificationError(
      scope,
      name,
      `target kind '${discriminator}' contradicts definition path '${definitionPath}'`
    );
  }
  return declared;
}
