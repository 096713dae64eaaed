/**
 * Recompose Command
 *
 * Rewrites the Policy Breakdown sheet of a catalog workbook from its edited
 * Include cells. Nothing is fetched.
 *
 * Usage:
 *   policy-catalog recompose <workbook> [--output <path>]
 *
 * @module cli/commands/recompose
 */

import { resolve } from 'node:path';

import { WorkbookFormatError } from '../../core/errors.js';
import { recomposeWorkbookFile, type RecomposeResult } from '../../sink/workbook-reader.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { createLinkBuilder, type ExtractContext } from './extract.js';
import { formatJson, printError, printOutput, printSuccess, printWarning } from '../lib/output.js';
import { formatSelectionKey } from '../lib/selection.js';

export interface RecomposeOptions {
  /** Write here instead of overwriting the input */
  readonly output?: string;
}

export interface RecomposeCommandResult {
  readonly exitCode: ExitCode;
  readonly result?: RecomposeResult;
}

export async function recomposeCommand(
  workbookPath: string,
  options: RecomposeOptions,
  context: ExtractContext
): Promise<RecomposeCommandResult> {
  const { config, logger } = context;
  const inputPath = resolve(workbookPath);
  const outputPath = resolve(options.output ?? workbookPath);
  logger.commandStart('recompose', { input: inputPath, output: outputPath });

  try {
    const result = await recomposeWorkbookFile(inputPath, outputPath, createLinkBuilder(config));
    const unmatched = [...result.breakdown.unmatchedInitiatives, ...result.breakdown.unmatchedPolicies];

    if (config.json) {
      printOutput(
        formatJson({
          output: result.path,
          selectedInitiatives: result.selectedInitiatives,
          selectedPolicies: result.selectedPolicies,
          breakdownRows: result.breakdown.rows.length,
          unmatchedSelections: unmatched.map(formatSelectionKey),
        })
      );
    } else {
      printSuccess(
        `Breakdown rewritten with ${result.breakdown.rows.length} rows ` +
          `(${result.selectedInitiatives} initiatives, ${result.selectedPolicies} policies selected) → ${result.path}`
      );
      for (const key of unmatched) {
        printWarning(`Selection ${formatSelectionKey(key)} matched no catalog row`);
      }
    }

    logger.commandEnd(true, { breakdownRows: result.breakdown.rows.length });
    return {
      exitCode: unmatched.length > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS,
      result,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.commandEnd(false, { error: message });
    printError(
      error instanceof WorkbookFormatError
        ? `${inputPath} is not a catalog workbook: ${message}`
        : `Recompose failed: ${message}`
    );
    return { exitCode: EXIT_CODES.ERRORS };
  }
}
