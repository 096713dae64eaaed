/**
 * Catalog Tables
 *
 * Column layout shared by the workbook writer and reader. Each sheet is a
 * header row followed by one row per item; the reader finds columns by
 * header text, so column order may change without breaking old workbooks.
 *
 * @module sink/tables
 */

import type {
  BreakdownRow,
  ResolvedCatalog,
  ResolvedInitiative,
  ResolvedPolicy,
  SelectionSet,
} from '../core/types.js';
import type { LinkBuilder } from '../links/link-builder.js';
import { initiativeKey, policyKey, policyOrder } from '../resolution/identity.js';

export type CellValue = string | number;

export interface Column<T> {
  readonly header: string;
  /** Character width hint */
  readonly width: number;
  readonly value: (row: T) => CellValue;
}

export interface Table {
  readonly name: string;
  readonly columns: readonly { readonly header: string; readonly width: number }[];
  readonly rows: readonly (readonly CellValue[])[];
}

// ============================================================================
// Sheet and Header Names
// ============================================================================

export const SHEET_NAMES = {
  initiatives: 'Initiatives',
  policies: 'Policies',
  initiativePolicies: 'Initiative Policies',
  breakdown: 'Policy Breakdown',
  liveBreakdown: 'Live Breakdown',
  policyData: '_PolicyData',
} as const;

export const HEADERS = {
  assignmentName: 'Assignment Name',
  initiativeId: 'Initiative Definition ID',
  initiativeDisplayName: 'Initiative Display Name',
  scope: 'Archetype (Scope)',
  enforcementMode: 'Enforcement Mode',
  policyCount: 'Policy Count',
  declaredPolicyCount: 'Declared Policy Count',
  category: 'Category',
  version: 'Version',
  policyType: 'Policy Type',
  description: 'Description',
  flags: 'Flags',
  definitionLink: 'AzAdvertizer Link (Definition)',
  assignmentLink: 'GitHub Link (Assignment)',
  include: 'Include',
  policyId: 'Policy Definition ID',
  policyDisplayName: 'Policy Display Name',
  effect: 'Effect',
  parameters: 'Parameters',
  parameterNames: 'Parameter Names',
  unresolvedParameters: 'Unresolved Parameters',
  assignmentType: 'Assignment Type',
  referenceId: 'Reference ID',
  reachedVia: 'Reached Via',
} as const;

export const INCLUDE_YES = 'Yes';
export const INCLUDE_NO = 'No';

/** Include cell values that select a row, after trimming and lower-casing */
export const INCLUDE_ACCEPTED = ['yes', 'y', 'true', '1', 'x'] as const;

export const ASSIGNMENT_TYPE_DIRECT = 'Individual';
export const ASSIGNMENT_TYPE_MEMBER = 'Via Initiative';

/** Key column of the hidden policy data sheet */
export const SELECTION_KEY_HEADER = 'Selection Key';

// ============================================================================
// Cell Encoding
// ============================================================================

/**
 * Comma-separated list cell
 */
export function listCell(values: readonly string[]): string {
  return values.join(', ');
}

/**
 * Effective parameters as a JSON object ('' when there are none)
 */
export function parametersCell(parameters: Readonly<Record<string, unknown>>): string {
  return Object.keys(parameters).length === 0 ? '' : JSON.stringify(parameters);
}

function assignmentUrl(
  links: LinkBuilder,
  row: { readonly scope: string; readonly assignmentName: string; readonly assignmentUrl: string }
): string {
  return row.assignmentUrl || links.assignmentLink(row.scope, row.assignmentName);
}

// ============================================================================
// Columns
// ============================================================================

function initiativeColumns(links: LinkBuilder, selection: SelectionSet): Column<ResolvedInitiative>[] {
  return [
    { header: HEADERS.assignmentName, width: 30, value: (i) => i.assignmentName },
    { header: HEADERS.initiativeId, width: 40, value: (i) => i.initiativeId },
    { header: HEADERS.initiativeDisplayName, width: 50, value: (i) => i.displayName },
    { header: HEADERS.scope, width: 20, value: (i) => i.scope },
    { header: HEADERS.enforcementMode, width: 18, value: (i) => i.enforcementMode },
    { header: HEADERS.policyCount, width: 12, value: (i) => i.memberCount },
    { header: HEADERS.declaredPolicyCount, width: 12, value: (i) => i.declaredMemberCount },
    { header: HEADERS.category, width: 20, value: (i) => i.category },
    { header: HEADERS.version, width: 10, value: (i) => i.version },
    { header: HEADERS.policyType, width: 12, value: (i) => i.policyType },
    { header: HEADERS.description, width: 60, value: (i) => i.description },
    { header: HEADERS.flags, width: 24, value: (i) => listCell(i.flags) },
    { header: HEADERS.definitionLink, width: 60, value: (i) => links.definitionLink(i.initiativeId, 'Initiative') },
    { header: HEADERS.assignmentLink, width: 60, value: (i) => assignmentUrl(links, i) },
    {
      header: HEADERS.include,
      width: 10,
      value: (i) => (selection.initiatives.has(initiativeKey(i)) ? INCLUDE_YES : INCLUDE_NO),
    },
  ];
}

function policyColumns(links: LinkBuilder): Column<ResolvedPolicy>[] {
  return [
    { header: HEADERS.policyId, width: 45, value: (p) => p.policyId },
    { header: HEADERS.policyDisplayName, width: 55, value: (p) => p.displayName },
    { header: HEADERS.effect, width: 18, value: (p) => p.effect },
    { header: HEADERS.parameters, width: 40, value: (p) => parametersCell(p.parameters) },
    { header: HEADERS.parameterNames, width: 30, value: (p) => listCell(p.parameterNames) },
    {
      header: HEADERS.assignmentType,
      width: 15,
      value: (p) => (p.parent === null ? ASSIGNMENT_TYPE_DIRECT : ASSIGNMENT_TYPE_MEMBER),
    },
    { header: HEADERS.initiativeId, width: 40, value: (p) => p.parent?.initiativeId ?? '' },
    { header: HEADERS.initiativeDisplayName, width: 50, value: (p) => p.parent?.displayName ?? '' },
    { header: HEADERS.referenceId, width: 30, value: (p) => p.referenceId },
    { header: HEADERS.assignmentName, width: 30, value: (p) => p.assignmentName },
    { header: HEADERS.scope, width: 20, value: (p) => p.scope },
    { header: HEADERS.enforcementMode, width: 18, value: (p) => p.enforcementMode },
    { header: HEADERS.category, width: 20, value: (p) => p.category },
    { header: HEADERS.version, width: 10, value: (p) => p.version },
    { header: HEADERS.policyType, width: 12, value: (p) => p.policyType },
    { header: HEADERS.description, width: 60, value: (p) => p.description },
    { header: HEADERS.unresolvedParameters, width: 24, value: (p) => listCell(p.unresolvedParameters) },
    { header: HEADERS.flags, width: 24, value: (p) => listCell(p.flags) },
    { header: HEADERS.definitionLink, width: 60, value: (p) => links.definitionLink(p.policyId, 'Policy') },
    { header: HEADERS.assignmentLink, width: 60, value: (p) => assignmentUrl(links, p) },
  ];
}

function breakdownColumns(links: LinkBuilder): Column<BreakdownRow>[] {
  return [
    { header: HEADERS.scope, width: 20, value: (r) => r.policy.scope },
    { header: HEADERS.assignmentName, width: 30, value: (r) => r.policy.assignmentName },
    { header: HEADERS.policyDisplayName, width: 55, value: (r) => r.policy.displayName },
    { header: HEADERS.policyId, width: 45, value: (r) => r.policy.policyId },
    { header: HEADERS.effect, width: 18, value: (r) => r.policy.effect },
    { header: HEADERS.parameters, width: 40, value: (r) => parametersCell(r.policy.parameters) },
    { header: HEADERS.category, width: 25, value: (r) => r.policy.category },
    {
      header: HEADERS.assignmentType,
      width: 15,
      value: (r) => (r.policy.parent === null ? ASSIGNMENT_TYPE_DIRECT : ASSIGNMENT_TYPE_MEMBER),
    },
    { header: HEADERS.initiativeId, width: 40, value: (r) => r.policy.parent?.initiativeId ?? '' },
    { header: HEADERS.initiativeDisplayName, width: 50, value: (r) => r.policy.parent?.displayName ?? '' },
    { header: HEADERS.enforcementMode, width: 18, value: (r) => r.policy.enforcementMode },
    { header: HEADERS.reachedVia, width: 40, value: (r) => listCell(r.reachedVia) },
    { header: HEADERS.flags, width: 24, value: (r) => listCell(r.policy.flags) },
    { header: HEADERS.definitionLink, width: 60, value: (r) => links.definitionLink(r.policy.policyId, 'Policy') },
  ];
}

/**
 * `I|<initiative id>|<scope>` for members, `P|<policy id>|<scope>` for direct
 * policies: the Include row that brings a policy into the breakdown
 */
function selectionKeyCell(policy: ResolvedPolicy): string {
  return policy.parent === null
    ? `P|${policy.policyId}|${policy.scope}`
    : `I|${policy.parent.initiativeId}|${policy.scope}`;
}

function policyDataColumns(): Column<ResolvedPolicy>[] {
  return [
    { header: SELECTION_KEY_HEADER, width: 50, value: selectionKeyCell },
    { header: HEADERS.scope, width: 20, value: (p) => p.scope },
    { header: HEADERS.assignmentName, width: 30, value: (p) => p.assignmentName },
    { header: HEADERS.policyDisplayName, width: 55, value: (p) => p.displayName },
    { header: HEADERS.policyId, width: 45, value: (p) => p.policyId },
    { header: HEADERS.effect, width: 18, value: (p) => p.effect },
    { header: HEADERS.parameters, width: 40, value: (p) => parametersCell(p.parameters) },
    { header: HEADERS.category, width: 25, value: (p) => p.category },
    {
      header: HEADERS.assignmentType,
      width: 15,
      value: (p) => (p.parent === null ? ASSIGNMENT_TYPE_DIRECT : ASSIGNMENT_TYPE_MEMBER),
    },
    { header: HEADERS.initiativeId, width: 40, value: (p) => p.parent?.initiativeId ?? '' },
    { header: HEADERS.initiativeDisplayName, width: 50, value: (p) => p.parent?.displayName ?? '' },
  ];
}

// ============================================================================
// Tables
// ============================================================================

function toTable<T>(name: string, columns: readonly Column<T>[], rows: readonly T[]): Table {
  return {
    name,
    columns: columns.map(({ header, width }) => ({ header, width })),
    rows: rows.map((row) => columns.map((column) => column.value(row))),
  };
}

export function initiativesTable(
  catalog: ResolvedCatalog,
  selection: SelectionSet,
  links: LinkBuilder
): Table {
  return toTable(SHEET_NAMES.initiatives, initiativeColumns(links, selection), catalog.initiatives);
}

/**
 * Direct policy listing, with the Include column
 */
export function policiesTable(
  catalog: ResolvedCatalog,
  selection: SelectionSet,
  links: LinkBuilder
): Table {
  const columns: Column<ResolvedPolicy>[] = [
    ...policyColumns(links),
    {
      header: HEADERS.include,
      width: 10,
      value: (p) => (selection.policies.has(policyKey(p)) ? INCLUDE_YES : INCLUDE_NO),
    },
  ];
  return toTable(SHEET_NAMES.policies, columns, catalog.directPolicies);
}

export function initiativePoliciesTable(catalog: ResolvedCatalog, links: LinkBuilder): Table {
  return toTable(SHEET_NAMES.initiativePolicies, policyColumns(links), catalog.initiativePolicies);
}

export function breakdownTable(rows: readonly BreakdownRow[], links: LinkBuilder): Table {
  return toTable(SHEET_NAMES.breakdown, breakdownColumns(links), rows);
}

/**
 * Every policy row a selection could bring in, in breakdown order
 *
 * Not deduplicated: a policy reached through two selected rows appears twice.
 */
export function policyDataTable(catalog: ResolvedCatalog): Table {
  const rows = [...catalog.initiativePolicies, ...catalog.directPolicies].sort(policyOrder);
  return toTable(SHEET_NAMES.policyData, policyDataColumns(), rows);
}
