/**
 * Catalog Sink Interface
 *
 * @module sink/types
 */

import type { ResolvedCatalog, ScopedIdentityKey, SelectionSet } from '../core/types.js';

export interface SinkResult {
  /** File written */
  readonly path: string;
  readonly breakdownRows: number;
  readonly unmatchedSelections: readonly ScopedIdentityKey[];
}

/**
 * Renders a resolved catalog and the breakdown for a selection
 */
export interface CatalogSink {
  render(catalog: ResolvedCatalog, selection: SelectionSet): Promise<SinkResult>;
}
