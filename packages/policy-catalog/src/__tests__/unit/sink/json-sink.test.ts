/**
 * JSON Sink Tests
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { silentLogger } from '../../../core/utils/logger.js';
import { selectionFromKeys } from '../../../resolution/breakdown.js';
import { resolveIdentities, scopedIdentityKey } from '../../../resolution/identity.js';
import { JsonSink } from '../../../sink/json-sink.js';
import { resolvedInitiative, resolvedPolicy } from '../../utils/fixtures.js';

describe('JsonSink', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'policy-catalog-json-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should write catalog, selection and breakdown', async () => {
    const { catalog } = resolveIdentities(
      [resolvedInitiative({ initiativeId: 'I1', scope: 'root' }, ['p1', 'p2'])],
      [resolvedPolicy({ policyId: 'p2', scope: 'root', assignmentName: 'Direct-p2' })]
    );
    const path = join(directory, 'nested', 'catalog.json');
    const selection = selectionFromKeys(
      [scopedIdentityKey('I1', 'root')],
      [scopedIdentityKey('p2', 'root'), scopedIdentityKey('p0', 'root')]
    );
    const sink = new JsonSink({
      outputPath: path,
      logger: silentLogger,
      now: () => new Date('2026-01-02T03:04:05Z'),
    });

    const result = await sink.render(catalog, selection);
    const document: unknown = JSON.parse(await readFile(path, 'utf-8'));

    expect(result).toEqual({ path, breakdownRows: 2, unmatchedSelections: ['scoped:p0|root'] });
    expect(document).toMatchObject({
      version: 1,
      generatedAt: '2026-01-02T03:04:05.000Z',
      selection: {
        initiatives: ['scoped:I1|root'],
        policies: ['scoped:p0|root', 'scoped:p2|root'],
      },
      unmatched: { initiatives: [], policies: ['scoped:p0|root'] },
    });
    expect(document).toMatchObject({
      breakdown: [
        { policy: { policyId: 'p2', assignmentName: 'Direct-p2', parent: null }, reachedVia: ['Direct-p2', 'I1'] },
        { policy: { policyId: 'p1', assignmentName: 'I1' }, reachedVia: ['I1'] },
      ],
    });
  });
});
