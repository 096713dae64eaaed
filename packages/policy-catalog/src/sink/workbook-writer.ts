/**
 * Workbook Sink
 *
 * Writes the catalog as an .xlsx workbook:
 *
 * | Sheet               | Rows                                      | Include |
 * |---------------------|-------------------------------------------|---------|
 * | Initiatives         | one per (initiative, scope)               | yes     |
 * | Policies            | one per directly assigned (policy, scope) | yes     |
 * | Initiative Policies | expanded members, definition order        | no      |
 * | Policy Breakdown    | merged rows for the written selection     | no      |
 * | Live Breakdown      | FILTER formula over the Include columns   | no      |
 * | _PolicyData         | hidden; rows the formula filters          | no      |
 *
 * Policy Breakdown holds values; `recompose` rewrites it from edited Include
 * cells. Live Breakdown is recalculated by Excel itself.
 *
 * @module sink/workbook-writer
 */

import * as XLSX from 'xlsx';

import type { BreakdownRow, ResolvedCatalog, SelectionSet } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { createLogger, type ComponentLogger } from '../core/utils/logger.js';
import { LinkBuilder } from '../links/link-builder.js';
import { composeBreakdown } from '../resolution/breakdown.js';
import { liveBreakdownSheet } from './live-breakdown.js';
import {
  breakdownTable,
  initiativePoliciesTable,
  initiativesTable,
  policiesTable,
  policyDataTable,
  SHEET_NAMES,
  type Table,
} from './tables.js';
import type { CatalogSink, SinkResult } from './types.js';

/**
 * Worksheet for a table: header row, autofilter and column widths
 */
export function tableToSheet(table: Table): XLSX.WorkSheet {
  const sheet = XLSX.utils.aoa_to_sheet([
    table.columns.map((column) => column.header),
    ...table.rows.map((row) => [...row]),
  ]);

  sheet['!cols'] = table.columns.map((column) => ({ wch: column.width }));
  if (table.columns.length > 0) {
    sheet['!autofilter'] = {
      ref: XLSX.utils.encode_range({
        s: { r: 0, c: 0 },
        e: { r: table.rows.length, c: table.columns.length - 1 },
      }),
    };
  }
  return sheet;
}

/**
 * Build the catalog workbook
 */
export function buildCatalogWorkbook(
  catalog: ResolvedCatalog,
  selection: SelectionSet,
  breakdown: readonly BreakdownRow[],
  links: LinkBuilder
): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  const initiatives = initiativesTable(catalog, selection, links);
  const policies = policiesTable(catalog, selection, links);
  const policyData = policyDataTable(catalog);

  const listings = [initiatives, policies, initiativePoliciesTable(catalog, links), breakdownTable(breakdown, links)];
  for (const table of listings) {
    XLSX.utils.book_append_sheet(workbook, tableToSheet(table), table.name);
  }
  XLSX.utils.book_append_sheet(
    workbook,
    liveBreakdownSheet(policyData, initiatives, policies),
    SHEET_NAMES.liveBreakdown
  );
  XLSX.utils.book_append_sheet(workbook, tableToSheet(policyData), policyData.name);

  workbook.Workbook = {
    Sheets: workbook.SheetNames.map((name) =>
      name === SHEET_NAMES.policyData ? { name, Hidden: 1 as const } : { name }
    ),
  };
  return workbook;
}

/**
 * Serialize a workbook to .xlsx bytes
 */
export function workbookToBuffer(workbook: XLSX.WorkBook): Buffer {
  const data: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return data;
}

export interface WorkbookSinkOptions {
  readonly outputPath: string;
  readonly links?: LinkBuilder;
  readonly logger?: ComponentLogger;
}

export class WorkbookSink implements CatalogSink {
  private readonly outputPath: string;
  private readonly links: LinkBuilder;
  private readonly log: ComponentLogger;

  constructor(options: WorkbookSinkOptions) {
    this.outputPath = options.outputPath;
    this.links = options.links ?? new LinkBuilder();
    this.log = options.logger ?? createLogger({ module: 'workbook-sink' });
  }

  async render(catalog: ResolvedCatalog, selection: SelectionSet): Promise<SinkResult> {
    const { rows, unmatchedInitiatives, unmatchedPolicies } = composeBreakdown(catalog, selection);
    const workbook = buildCatalogWorkbook(catalog, selection, rows, this.links);

    await atomicWriteFile(this.outputPath, workbookToBuffer(workbook));

    this.log.info('Workbook written', {
      path: this.outputPath,
      initiatives: catalog.initiatives.length,
      directPolicies: catalog.directPolicies.length,
      initiativePolicies: catalog.initiativePolicies.length,
      breakdownRows: rows.length,
    });

    return {
      path: this.outputPath,
      breakdownRows: rows.length,
      unmatchedSelections: [...unmatchedInitiatives, ...unmatchedPolicies],
    };
  }
}
