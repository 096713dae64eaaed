/**
 * ARM resource path helpers
 *
 * Definition references arrive either as full resource paths
 * (`/providers/Microsoft.Authorization/policySetDefinitions/<id>`) or as
 * bare identifiers.
 */

import { POLICY_SEGMENT, POLICY_SET_SEGMENT } from './constants.js';
import type { TargetKind } from './types.js';

/**
 * Last segment of a resource path
 *
 * '' when the path is empty or ends with a separator.
 */
export function extractDefinitionId(path: string): string {
  const segments = path.trim().split('/');
  return segments[segments.length - 1].trim();
}

/**
 * Kind named by the resource type segment of a path, or null for bare identifiers
 */
export function inferKindFromPath(path: string): TargetKind | null {
  const segments = path.trim().split('/').map((segment) => segment.toLowerCase());
  // The final segment is the identifier itself
  const typeSegments = segments.slice(0, -1);

  if (typeSegments.includes(POLICY_SET_SEGMENT.toLowerCase())) {
    return 'Initiative';
  }
  if (typeSegments.includes(POLICY_SEGMENT.toLowerCase())) {
    return 'Policy';
  }
  return null;
}
