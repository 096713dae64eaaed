/**
 * Catalog Table Tests
 */

import { describe, it, expect } from 'vitest';

import { LinkBuilder } from '../../../links/link-builder.js';
import { composeBreakdown, selectionFromKeys } from '../../../resolution/breakdown.js';
import { resolveIdentities, scopedIdentityKey } from '../../../resolution/identity.js';
import {
  breakdownTable,
  HEADERS,
  initiativePoliciesTable,
  initiativesTable,
  parametersCell,
  policiesTable,
  type Table,
} from '../../../sink/tables.js';
import { resolvedInitiative, resolvedPolicy } from '../../utils/fixtures.js';

const links = new LinkBuilder({ azAdvertizerBase: 'https://az.example.test', githubWebBase: 'https://git.example.test' });

function column(table: Table, header: string): unknown[] {
  const index = table.columns.findIndex((c) => c.header === header);
  if (index < 0) {
    throw new Error(`No column ${header}`);
  }
  return table.rows.map((row) => row[index]);
}

const { catalog } = resolveIdentities(
  [
    resolvedInitiative({ initiativeId: 'I1', scope: 'root', flags: ['member-count-mismatch'], declaredMemberCount: 3 }, [
      'p1',
      'p2',
    ]),
    resolvedInitiative({ initiativeId: 'I2', scope: 'root', assignmentUrl: '' }, ['p2']),
  ],
  [
    resolvedPolicy({
      policyId: 'p9',
      assignmentName: 'Deny-P9',
      parameters: { effect: 'Deny', list: ['a'] },
      parameterNames: ['effect', 'list'],
    }),
  ]
);

const selection = selectionFromKeys([scopedIdentityKey('I1', 'root')], []);

describe('catalog tables', () => {
  it('should mark included initiatives and count members', () => {
    const table = initiativesTable(catalog, selection, links);

    expect(table.name).toBe('Initiatives');
    expect(column(table, HEADERS.initiativeId)).toEqual(['I1', 'I2']);
    expect(column(table, HEADERS.include)).toEqual(['Yes', 'No']);
    expect(column(table, HEADERS.policyCount)).toEqual([2, 1]);
    expect(column(table, HEADERS.declaredPolicyCount)).toEqual([3, 1]);
    expect(column(table, HEADERS.flags)).toEqual(['member-count-mismatch', '']);
  });

  it('should prefer the source URL and fall back to the library link', () => {
    const table = initiativesTable(catalog, selection, links);

    expect(column(table, HEADERS.assignmentLink)).toEqual([
      'https://example.test/assignments/I1.json',
      'https://git.example.test/Azure/terraform-azurerm-caf-enterprise-scale/blob/main/modules/archetypes/lib/policy_assignments/policy_assignment_es_i2.tmpl.json',
    ]);
    expect(column(table, HEADERS.definitionLink)[0]).toBe('https://az.example.test/azpolicyinitiativesadvertizer/I1.html');
  });

  it('should render direct policies with parameters and Include', () => {
    const table = policiesTable(catalog, selection, links);

    expect(column(table, HEADERS.parameters)).toEqual(['{"effect":"Deny","list":["a"]}']);
    expect(column(table, HEADERS.parameterNames)).toEqual(['effect, list']);
    expect(column(table, HEADERS.assignmentType)).toEqual(['Individual']);
    expect(column(table, HEADERS.initiativeId)).toEqual(['']);
    expect(column(table, HEADERS.include)).toEqual(['No']);
  });

  it('should list expanded members with their parent', () => {
    const table = initiativePoliciesTable(catalog, links);

    expect(table.columns.map((c) => c.header)).not.toContain(HEADERS.include);
    expect(column(table, HEADERS.policyId)).toEqual(['p1', 'p2', 'p2']);
    expect(column(table, HEADERS.initiativeId)).toEqual(['I1', 'I1', 'I2']);
    expect(column(table, HEADERS.assignmentType)).toEqual(['Via Initiative', 'Via Initiative', 'Via Initiative']);
  });

  it('should render breakdown rows with their paths', () => {
    const all = selectionFromKeys([scopedIdentityKey('I1', 'root'), scopedIdentityKey('I2', 'root')], []);
    const table = breakdownTable(composeBreakdown(catalog, all).rows, links);

    expect(table.name).toBe('Policy Breakdown');
    expect(column(table, HEADERS.policyId)).toEqual(['p1', 'p2']);
    expect(column(table, HEADERS.reachedVia)).toEqual(['I1', 'I1, I2']);
  });
});

describe('parametersCell', () => {
  it('should leave the cell empty without parameters', () => {
    expect(parametersCell({})).toBe('');
    expect(parametersCell({ workspace: null })).toBe('{"workspace":null}');
  });
});
