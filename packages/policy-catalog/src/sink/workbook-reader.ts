/**
 * Workbook Reader
 *
 * Reads a catalog workbook back into a ResolvedCatalog and the selection its
 * Include cells express, then regenerates the Policy Breakdown sheet. No
 * source is contacted.
 *
 * @module sink/workbook-reader
 */

import { readFile } from 'node:fs/promises';

import * as XLSX from 'xlsx';

import { WorkbookFormatError } from '../core/errors.js';
import { isEnforcementMode, isRecord, isResolutionFlag } from '../core/type-guards.js';
import type {
  ParameterValues,
  ResolutionFlag,
  ResolvedCatalog,
  ResolvedInitiative,
  ResolvedPolicy,
  ScopedIdentityKey,
  SelectionSet,
} from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { LinkBuilder } from '../links/link-builder.js';
import { composeBreakdown, type BreakdownResult } from '../resolution/breakdown.js';
import { normalizeEnforcementMode } from '../resolution/classifier.js';
import { buildResolvedInitiative } from '../resolution/expander.js';
import { initiativeKey, policyKey, scopedIdentityKey } from '../resolution/identity.js';
import { ASSIGNMENT_TYPE_DIRECT, breakdownTable, HEADERS, INCLUDE_ACCEPTED, SHEET_NAMES } from './tables.js';
import { tableToSheet, workbookToBuffer } from './workbook-writer.js';

const INCLUDE_TRUE: ReadonlySet<string> = new Set(INCLUDE_ACCEPTED);

export interface WorkbookContents {
  readonly catalog: ResolvedCatalog;
  readonly selection: SelectionSet;
}

// ============================================================================
// Sheet Access
// ============================================================================

type SheetRecord = ReadonlyMap<string, unknown>;

function cellText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Data rows of a sheet keyed by header, after checking required headers
 *
 * Rows whose cells are all blank are skipped.
 */
function readSheet(
  workbook: XLSX.WorkBook,
  name: string,
  required: readonly string[]
): SheetRecord[] {
  const sheet = workbook.Sheets[name];
  if (sheet === undefined) {
    throw new WorkbookFormatError(`Workbook has no '${name}' sheet`, name);
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: '', raw: true });
  const [headerRow, ...dataRows] = matrix;
  const headers = (headerRow ?? []).map((cell) => cellText(cell).trim());

  const missing = required.filter((header) => !headers.includes(header));
  if (missing.length > 0) {
    throw new WorkbookFormatError(
      `Sheet '${name}' is missing column(s): ${missing.join(', ')}`,
      name
    );
  }

  const records: SheetRecord[] = [];
  for (const row of dataRows) {
    if (row.every((cell) => cellText(cell).trim() === '')) continue;
    const record = new Map<string, unknown>();
    headers.forEach((header, index) => {
      if (header.length > 0 && !record.has(header)) {
        record.set(header, row[index]);
      }
    });
    records.push(record);
  }
  return records;
}

function text(record: SheetRecord, header: string): string {
  return cellText(record.get(header));
}

function list(record: SheetRecord, header: string): string[] {
  return text(record, header)
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function flags(record: SheetRecord): ResolutionFlag[] {
  return list(record, HEADERS.flags).filter(isResolutionFlag);
}

function count(record: SheetRecord, header: string): number {
  const value = Number(text(record, header));
  return Number.isInteger(value) && value >= 0 ? value : 0;
}

function parameters(record: SheetRecord): ParameterValues {
  const raw = text(record, HEADERS.parameters).trim();
  if (raw.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

function included(record: SheetRecord): boolean {
  return INCLUDE_TRUE.has(text(record, HEADERS.include).trim().toLowerCase());
}

function enforcementMode(record: SheetRecord): ResolvedPolicy['enforcementMode'] {
  const value = text(record, HEADERS.enforcementMode).trim();
  return isEnforcementMode(value) ? value : normalizeEnforcementMode(value);
}

// ============================================================================
// Row Decoding
// ============================================================================

const POLICY_HEADERS = [
  HEADERS.policyId,
  HEADERS.policyDisplayName,
  HEADERS.assignmentType,
  HEADERS.assignmentName,
  HEADERS.scope,
] as const;

const INITIATIVE_HEADERS = [
  HEADERS.initiativeId,
  HEADERS.initiativeDisplayName,
  HEADERS.assignmentName,
  HEADERS.scope,
  HEADERS.include,
] as const;

function decodePolicy(record: SheetRecord): ResolvedPolicy {
  const direct = text(record, HEADERS.assignmentType) === ASSIGNMENT_TYPE_DIRECT;
  return {
    policyId: text(record, HEADERS.policyId),
    displayName: text(record, HEADERS.policyDisplayName),
    description: text(record, HEADERS.description),
    category: text(record, HEADERS.category),
    version: text(record, HEADERS.version),
    policyType: text(record, HEADERS.policyType),
    effect: text(record, HEADERS.effect),
    scope: text(record, HEADERS.scope),
    assignmentName: text(record, HEADERS.assignmentName),
    enforcementMode: enforcementMode(record),
    parent: direct
      ? null
      : {
          initiativeId: text(record, HEADERS.initiativeId),
          displayName: text(record, HEADERS.initiativeDisplayName),
        },
    referenceId: text(record, HEADERS.referenceId),
    parameters: parameters(record),
    parameterNames: list(record, HEADERS.parameterNames),
    unresolvedParameters: list(record, HEADERS.unresolvedParameters),
    flags: flags(record),
    assignmentUrl: text(record, HEADERS.assignmentLink),
  };
}

function decodeInitiative(record: SheetRecord, members: readonly ResolvedPolicy[]): ResolvedInitiative {
  return buildResolvedInitiative(
    {
      initiativeId: text(record, HEADERS.initiativeId),
      displayName: text(record, HEADERS.initiativeDisplayName),
      description: text(record, HEADERS.description),
      category: text(record, HEADERS.category),
      version: text(record, HEADERS.version),
      policyType: text(record, HEADERS.policyType),
      scope: text(record, HEADERS.scope),
      assignmentName: text(record, HEADERS.assignmentName),
      enforcementMode: enforcementMode(record),
      declaredMemberCount: count(record, HEADERS.declaredPolicyCount),
      flags: flags(record),
      assignmentUrl: text(record, HEADERS.assignmentLink),
    },
    members
  );
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Decode the catalog and Include selection stored in a workbook
 *
 * @throws {WorkbookFormatError} When a sheet or required column is missing
 */
export function readCatalogWorkbook(workbook: XLSX.WorkBook): WorkbookContents {
  const memberRecords = readSheet(workbook, SHEET_NAMES.initiativePolicies, [
    ...POLICY_HEADERS,
    HEADERS.initiativeId,
  ]);
  const membersByInitiative = new Map<ScopedIdentityKey, ResolvedPolicy[]>();
  for (const record of memberRecords) {
    const member = decodePolicy(record);
    const key = scopedIdentityKey(member.parent?.initiativeId ?? '', member.scope);
    const members = membersByInitiative.get(key);
    if (members) {
      members.push(member);
    } else {
      membersByInitiative.set(key, [member]);
    }
  }

  const selectedInitiatives = new Set<ScopedIdentityKey>();
  const initiatives = readSheet(workbook, SHEET_NAMES.initiatives, INITIATIVE_HEADERS).map((record) => {
    const key = scopedIdentityKey(text(record, HEADERS.initiativeId), text(record, HEADERS.scope));
    const initiative = decodeInitiative(record, membersByInitiative.get(key) ?? []);
    if (included(record)) {
      selectedInitiatives.add(initiativeKey(initiative));
    }
    return initiative;
  });

  const selectedPolicies = new Set<ScopedIdentityKey>();
  const directPolicies = readSheet(workbook, SHEET_NAMES.policies, [...POLICY_HEADERS, HEADERS.include]).map(
    (record) => {
      const policy = decodePolicy(record);
      if (included(record)) {
        selectedPolicies.add(policyKey(policy));
      }
      return policy;
    }
  );

  return {
    catalog: {
      initiatives,
      directPolicies,
      initiativePolicies: initiatives.flatMap((initiative) => initiative.members),
    },
    selection: { initiatives: selectedInitiatives, policies: selectedPolicies },
  };
}

/**
 * Replace (or add) the breakdown sheet of a workbook
 */
export function replaceBreakdownSheet(
  workbook: XLSX.WorkBook,
  breakdown: BreakdownResult,
  links: LinkBuilder
): void {
  const sheet = tableToSheet(breakdownTable(breakdown.rows, links));
  if (workbook.SheetNames.includes(SHEET_NAMES.breakdown)) {
    workbook.Sheets[SHEET_NAMES.breakdown] = sheet;
  } else {
    XLSX.utils.book_append_sheet(workbook, sheet, SHEET_NAMES.breakdown);
  }
}

export interface RecomposeResult {
  readonly path: string;
  readonly breakdown: BreakdownResult;
  readonly selectedInitiatives: number;
  readonly selectedPolicies: number;
}

/**
 * Recompute the breakdown of a workbook from its Include cells
 *
 * Every other sheet is written back untouched.
 *
 * @param inputPath - Workbook to read
 * @param outputPath - Where to write (default: overwrite the input)
 */
export async function recomposeWorkbookFile(
  inputPath: string,
  outputPath: string = inputPath,
  links: LinkBuilder = new LinkBuilder()
): Promise<RecomposeResult> {
  const workbook = XLSX.read(await readFile(inputPath), { type: 'buffer' });
  const { catalog, selection } = readCatalogWorkbook(workbook);
  const breakdown = composeBreakdown(catalog, selection);

  replaceBreakdownSheet(workbook, breakdown, links);
  await atomicWriteFile(outputPath, workbookToBuffer(workbook));

  return {
    path: outputPath,
    breakdown,
    selectedInitiatives: selection.initiatives.size,
    selectedPolicies: selection.policies.size,
  };
}
