/**
 * Type Guards for Policy Catalog
 *
 * Runtime narrowing for values read out of fetched JSON documents.
 */

import type { EnforcementMode, ResolutionFlag } from './types.js';

/**
 * Plain object (not null, not an array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * String with at least one non-whitespace character
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

const RESOLUTION_FLAGS: ReadonlySet<unknown> = new Set<ResolutionFlag>([
  'definition-not-found',
  'nested-initiative',
  'unresolved-parameter',
  'member-count-mismatch',
]);

/**
 * Type guard for resolution flags
 */
export function isResolutionFlag(value: unknown): value is ResolutionFlag {
  return RESOLUTION_FLAGS.has(value);
}

/**
 * Type guard for enforcement modes
 */
export function isEnforcementMode(value: unknown): value is EnforcementMode {
  return value === 'Default' || value === 'DoNotEnforce';
}
