/**
 * Per-run definition cache
 *
 * Memoizes the lookup promise per (kind, definition) so a definition is
 * fetched at most once per run, concurrent callers included. A FetchFailure
 * is logged, recorded and cached as "not found"; any other error propagates.
 *
 * @module resolution/definition-cache
 */

import { FetchFailure } from '../core/errors.js';
import type { Definition, TargetKind } from '../core/types.js';
import { logger as defaultLogger, type ComponentLogger } from '../core/utils/logger.js';
import type { DefinitionSource } from '../providers/types.js';
import { definitionIdentityKey } from './identity.js';

/**
 * A fetch that failed and was treated as not found
 */
export interface FetchFailureRecord {
  readonly definitionId: string;
  readonly kind: TargetKind;
  readonly url: string;
  readonly message: string;
}

export class DefinitionCache {
  private readonly entries = new Map<string, Promise<Definition | null>>();
  private readonly failures: FetchFailureRecord[] = [];
  private fetches = 0;

  constructor(
    private readonly source: DefinitionSource,
    private readonly log: ComponentLogger = defaultLogger
  ) {}

  /**
   * Definition for `definitionId`, or null when not found or not fetchable
   */
  get(definitionId: string, kind: TargetKind): Promise<Definition | null> {
    const key = `${kind}:${definitionIdentityKey(definitionId)}`;
    let entry = this.entries.get(key);
    if (entry === undefined) {
      entry = this.load(definitionId, kind);
      this.entries.set(key, entry);
    }
    return entry;
  }

  /**
   * Bound lookup function for the expander
   */
  readonly lookup = (definitionId: string, kind: TargetKind): Promise<Definition | null> =>
    this.get(definitionId, kind);

  /** Source calls made so far */
  get fetchCount(): number {
    return this.fetches;
  }

  getFailures(): readonly FetchFailureRecord[] {
    return this.failures;
  }

  private async load(definitionId: string, kind: TargetKind): Promise<Definition | null> {
    this.fetches++;
    try {
      const definition = await this.source.fetchDefinition(definitionId, kind);
      if (definition === null) {
        this.log.debug('Definition not found', { definitionId, kind, source: this.source.name });
      }
      return definition;
    } catch (error) {
      if (!(error instanceof FetchFailure)) {
        throw error;
      }
      this.failures.push({
        definitionId,
        kind,
        url: error.url,
        message: error.cause.message,
      });
      this.log.warn('Definition fetch failed; continuing without it', {
        definitionId,
        kind,
        url: error.url,
        error: error.cause.message,
      });
      return null;
    }
  }
}
