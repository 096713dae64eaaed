/**
 * Policy Catalog Error Types
 *
 * Only ArchetypeEnumerationError and ConfigurationError end a run. The rest
 * are recorded in the run report while resolution continues with flagged rows.
 */

import type { TargetKind } from './types.js';

/**
 * A raw assignment record cannot be typed as a policy or an initiative
 */
export class ClassificationError extends Error {
  /**
   * @param scope - Archetype that declared the record
   * @param assignmentName - Best-known name of the record ('' when absent)
   * @param reason - Why classification failed
   */
  constructor(
    public readonly scope: string,
    public readonly assignmentName: string,
    public readonly reason: string
  ) {
    super(`Cannot classify assignment '${assignmentName || '<unnamed>'}' in ${scope}: ${reason}`);
    this.name = 'ClassificationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ClassificationError);
    }
  }
}

/**
 * A definition fetch failed for a transient reason
 *
 * Callers treat the identifier as not found for the rest of the run.
 */
export class FetchFailure extends Error {
  constructor(
    public readonly definitionId: string,
    public readonly kind: TargetKind,
    public readonly url: string,
    public readonly cause: Error
  ) {
    super(`Failed to fetch ${kind.toLowerCase()} '${definitionId}' from ${url}: ${cause.message}`);
    this.name = 'FetchFailure';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FetchFailure);
    }
  }
}

/**
 * An initiative claims a member count its member list does not parse to
 */
export class InconsistentMemberCount extends Error {
  constructor(
    public readonly initiativeId: string,
    public readonly declared: number,
    public readonly parsed: number
  ) {
    super(
      `Initiative '${initiativeId}' declares ${declared} members but ${parsed} parsed`
    );
    this.name = 'InconsistentMemberCount';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InconsistentMemberCount);
    }
  }
}

/**
 * No archetypes could be enumerated; nothing to catalog
 */
export class ArchetypeEnumerationError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
    this.name = 'ArchetypeEnumerationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ArchetypeEnumerationError);
    }
  }
}

/**
 * Configuration file or flags are invalid
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }

  /**
   * Get formatted summary of configuration issues
   */
  getSummary(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    return [this.message, ...this.issues.map((issue) => `  - ${issue}`)].join('\n');
  }
}

/**
 * A workbook does not have the sheets or columns the reader expects
 */
export class WorkbookFormatError extends Error {
  constructor(
    message: string,
    public readonly sheet: string
  ) {
    super(message);
    this.name = 'WorkbookFormatError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WorkbookFormatError);
    }
  }
}
