/**
 * Live Breakdown Sheet
 *
 * A formula view of the breakdown that Excel recalculates as Include cells
 * change. The formula filters the hidden `_PolicyData` sheet by the
 * selection key of each row (`I|<initiative>|<scope>` or
 * `P|<policy>|<scope>`) against the keys of the Include rows on the
 * Initiatives and Policies sheets.
 *
 * FILTER spills, so the sheet needs Excel 365 or Excel 2021+. Unlike the
 * static Policy Breakdown sheet, rows are not merged per (policy, scope).
 *
 * @module sink/live-breakdown
 */

import * as XLSX from 'xlsx';

import { HEADERS, INCLUDE_ACCEPTED, SELECTION_KEY_HEADER, type Table } from './tables.js';

/** Row of the live sheet holding column headers (0-based) */
const LIVE_HEADER_ROW = 8;

export const LIVE_EMPTY_MESSAGE = 'No rows selected - set Include to Yes on the Initiatives or Policies sheet';

const INSTRUCTIONS: readonly string[] = [
  'Policy Breakdown - recalculated from the Include columns',
  '',
  'Instructions:',
  "1. Set Include to 'Yes' on the Initiatives or Policies sheet",
  '2. Rows below update by (definition, scope); needs Excel 365 or Excel 2021+',
  "3. 'policy-catalog recompose' rewrites the merged Policy Breakdown sheet",
];

function sheetRef(name: string): string {
  return `'${name.replace(/'/g, "''")}'!`;
}

/**
 * Absolute data range of one column, e.g. `'Initiatives'!$B$2:$B$7`
 */
function columnRange(table: Table, header: string): string {
  const index = table.columns.findIndex((column) => column.header === header);
  if (index < 0) {
    throw new Error(`Table '${table.name}' has no '${header}' column`);
  }
  const column = XLSX.utils.encode_col(index);
  return `${sheetRef(table.name)}$${column}$2:$${column}$${table.rows.length + 1}`;
}

function includedTest(range: string): string {
  const accepted = INCLUDE_ACCEPTED.map((value) => `"${value}"`).join(',');
  return `ISNUMBER(MATCH(LOWER(TRIM(${range})),{${accepted}},0))`;
}

/**
 * Keys of the rows a listing sheet selects; `""` when the listing is empty
 */
function selectedKeys(prefix: 'I' | 'P', table: Table, idHeader: string): string {
  if (table.rows.length === 0) {
    return '""';
  }
  const keys = `"${prefix}|"&${columnRange(table, idHeader)}&"|"&${columnRange(table, HEADERS.scope)}`;
  return `_xlfn._xlws.FILTER(${keys},${includedTest(columnRange(table, HEADERS.include))},"")`;
}

/**
 * Spilling breakdown formula (stored form, without the leading '=')
 */
export function liveBreakdownFormula(data: Table, initiatives: Table, policies: Table): string {
  const lastRow = data.rows.length + 1;
  const lastColumn = XLSX.utils.encode_col(data.columns.length - 1);
  const source = `${sheetRef(data.name)}$B$2:$${lastColumn}$${lastRow}`;
  const keys = columnRange(data, SELECTION_KEY_HEADER);
  const matches = (selected: string) => `ISNUMBER(MATCH(${keys},${selected},0))`;

  return (
    `IFERROR(_xlfn._xlws.FILTER(${source},` +
    `(${matches(selectedKeys('I', initiatives, HEADERS.initiativeId))}` +
    `+${matches(selectedKeys('P', policies, HEADERS.policyId))})>0),` +
    `"${LIVE_EMPTY_MESSAGE}")`
  );
}

/**
 * Instructions, headers and the formula cell
 *
 * The formula cell spans the largest possible result, the data sheet's row
 * count, so Excel can spill into it.
 */
export function liveBreakdownSheet(data: Table, initiatives: Table, policies: Table): XLSX.WorkSheet {
  const headers = data.columns.slice(1).map((column) => column.header);
  const rows: string[][] = INSTRUCTIONS.map((line) => [line]);
  while (rows.length < LIVE_HEADER_ROW) rows.push([]);
  rows.push(headers);

  const sheet = XLSX.utils.aoa_to_sheet(rows);
  const origin = XLSX.utils.encode_cell({ r: LIVE_HEADER_ROW + 1, c: 0 });
  const spill = {
    s: { r: LIVE_HEADER_ROW + 1, c: 0 },
    e: { r: LIVE_HEADER_ROW + Math.max(data.rows.length, 1), c: headers.length - 1 },
  };

  sheet[origin] =
    data.rows.length === 0
      ? { t: 's', v: 'No policies in the catalog' }
      : {
          t: 's',
          v: '',
          f: liveBreakdownFormula(data, initiatives, policies),
          F: XLSX.utils.encode_range(spill),
          D: true,
        };
  sheet['!ref'] = XLSX.utils.encode_range({ s: { r: 0, c: 0 }, e: spill.e });
  sheet['!cols'] = data.columns.slice(1).map((column) => ({ wch: column.width }));
  return sheet;
}
