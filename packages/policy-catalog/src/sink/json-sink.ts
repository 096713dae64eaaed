/**
 * JSON Sink
 *
 * Writes the catalog, the selection and its breakdown as one JSON document,
 * for pipelines that do not want a workbook.
 *
 * @module sink/json-sink
 */

import type { ResolvedCatalog, SelectionSet } from '../core/types.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { createLogger, type ComponentLogger } from '../core/utils/logger.js';
import { composeBreakdown } from '../resolution/breakdown.js';
import { compareText } from '../resolution/identity.js';
import type { CatalogSink, SinkResult } from './types.js';

export const CATALOG_DOCUMENT_VERSION = 1;

export interface JsonSinkOptions {
  readonly outputPath: string;
  readonly logger?: ComponentLogger;
  /** Clock for `generatedAt` (default: current time) */
  readonly now?: () => Date;
}

export class JsonSink implements CatalogSink {
  private readonly outputPath: string;
  private readonly log: ComponentLogger;
  private readonly now: () => Date;

  constructor(options: JsonSinkOptions) {
    this.outputPath = options.outputPath;
    this.log = options.logger ?? createLogger({ module: 'json-sink' });
    this.now = options.now ?? (() => new Date());
  }

  async render(catalog: ResolvedCatalog, selection: SelectionSet): Promise<SinkResult> {
    const breakdown = composeBreakdown(catalog, selection);

    await atomicWriteJSON(this.outputPath, {
      version: CATALOG_DOCUMENT_VERSION,
      generatedAt: this.now().toISOString(),
      selection: {
        initiatives: [...selection.initiatives].sort(compareText),
        policies: [...selection.policies].sort(compareText),
      },
      initiatives: catalog.initiatives,
      directPolicies: catalog.directPolicies,
      breakdown: breakdown.rows,
      unmatched: {
        initiatives: breakdown.unmatchedInitiatives,
        policies: breakdown.unmatchedPolicies,
      },
    });

    this.log.info('Catalog JSON written', { path: this.outputPath, breakdownRows: breakdown.rows.length });

    return {
      path: this.outputPath,
      breakdownRows: breakdown.rows.length,
      unmatchedSelections: [...breakdown.unmatchedInitiatives, ...breakdown.unmatchedPolicies],
    };
  }
}
