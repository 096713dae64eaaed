/**
 * Source Interfaces
 *
 * What the resolution core needs from the document fetchers. Sources own
 * network access, pacing and retry; the core only awaits these calls.
 *
 * @module providers/types
 */

import type { Definition, TargetKind } from '../core/types.js';

/**
 * One assignment reference declared by an archetype
 */
export interface RawAssignmentRecord {
  /** Name the archetype used to reference the assignment */
  readonly referenceName: string;
  /** Parsed assignment document; null when the source could not locate it */
  readonly document: unknown;
  /** Where the document lives ('' when unknown) */
  readonly sourceUrl: string;
}

/**
 * One archetype (scope) and the assignments it declares
 */
export interface ArchetypeDeclaration {
  readonly name: string;
  readonly assignments: readonly RawAssignmentRecord[];
}

/**
 * Enumerates archetypes and their raw assignment declarations
 */
export interface ArchetypeSource {
  /** Human-readable source name for logs */
  readonly name: string;
  fetchArchetypes(): Promise<ArchetypeDeclaration[]>;
}

/**
 * Resolves definitions by identifier
 *
 * Resolves to null when the definition does not exist. Throws FetchFailure
 * when the lookup failed for a transient reason. Must be safe to call more
 * than once for the same identifier.
 */
export interface DefinitionSource {
  readonly name: string;
  fetchDefinition(definitionId: string, kind: TargetKind): Promise<Definition | null>;
}
