/**
 * Recompose Command Tests
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import * as XLSX from 'xlsx';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { recomposeCommand } from '../../../cli/commands/recompose.js';
import { loadConfig, type CLIConfig } from '../../../cli/lib/config.js';
import { EXIT_CODES } from '../../../cli/lib/exit-codes.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import { LinkBuilder } from '../../../links/link-builder.js';
import { composeBreakdown, selectionFromKeys } from '../../../resolution/breakdown.js';
import { resolveIdentities, scopedIdentityKey } from '../../../resolution/identity.js';
import { buildCatalogWorkbook, workbookToBuffer } from '../../../sink/workbook-writer.js';
import { readCatalogWorkbook } from '../../../sink/workbook-reader.js';
import { resolvedInitiative, resolvedPolicy } from '../../utils/fixtures.js';

describe('recomposeCommand', () => {
  let directory: string;
  let config: CLIConfig;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'policy-catalog-recompose-'));
    config = loadConfig({ env: {}, cwd: directory });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  const context = () => ({ config, logger: createCLILogger({ level: 'error' }) });

  async function writeWorkbook(path: string): Promise<void> {
    const { catalog } = resolveIdentities(
      [resolvedInitiative({ initiativeId: 'I1' }, ['p1', 'p2'])],
      [resolvedPolicy({ policyId: 'p3' })]
    );
    const selection = selectionFromKeys([scopedIdentityKey('I1', 'root')], [scopedIdentityKey('p3', 'root')]);
    const breakdown = composeBreakdown(catalog, selection);
    await writeFile(path, workbookToBuffer(buildCatalogWorkbook(catalog, selection, breakdown.rows, new LinkBuilder())));
  }

  it('should rewrite the breakdown into a separate output', async () => {
    const input = join(directory, 'catalog.xlsx');
    const output = join(directory, 'recomposed.xlsx');
    await writeWorkbook(input);

    const { exitCode, result } = await recomposeCommand(input, { output }, context());

    expect(exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(result?.path).toBe(output);
    expect(result?.breakdown.rows.map((row) => row.policy.policyId)).toEqual(['p3', 'p1', 'p2']);

    const recomposed = readCatalogWorkbook(XLSX.read(await readFile(output), { type: 'buffer' }));
    expect(recomposed.catalog.directPolicies.map((p) => p.policyId)).toEqual(['p3']);
  });

  it('should fail for a file that does not exist', async () => {
    const { exitCode, result } = await recomposeCommand(join(directory, 'missing.xlsx'), {}, context());

    expect(exitCode).toBe(EXIT_CODES.ERRORS);
    expect(result).toBeUndefined();
  });
});
