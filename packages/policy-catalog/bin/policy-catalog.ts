#!/usr/bin/env tsx
/**
 * Policy Catalog CLI Entry Point
 *
 * Builds a deduplicated catalog of the policy assignments declared across the
 * archetypes of a landing-zone library, and recomposes its breakdown.
 *
 * @module policy-catalog-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { extractCommand } from '../src/cli/commands/extract.js';
import { recomposeCommand } from '../src/cli/commands/recompose.js';
import { DUPLICATE_PREFERENCE_HELP, loadConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { ConfigurationError } from '../src/core/errors.js';
import { isRecord } from '../src/core/type-guards.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return isRecord(packageJson) && typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function initializeContext(options: {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  timeout?: number;
}): GlobalContext {
  const startTime = Date.now();

  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeout: options.timeout,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got '${value}'`);
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('policy-catalog')
    .description('Policy Catalog - cross-scope catalog of landing-zone policy assignments')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .policy-catalogrc)')
    .option('--timeout <ms>', 'HTTP request timeout in milliseconds', parseInteger)
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts();
      try {
        initializeContext(options);
      } catch (error) {
        console.error(
          error instanceof ConfigurationError
            ? `Configuration error: ${error.getSummary()}`
            : `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('extract')
    .description('Build the catalog from the archetype library and write it')
    .option('--source <kind>', 'Source: remote|directory')
    .option('--directory <path>', 'Library root for --source directory')
    .option('-o, --output <path>', 'Output file')
    .option('--format <fmt>', 'Output format: xlsx|json')
    .option('--duplicate-preference <p>', `Duplicate preference: ${DUPLICATE_PREFERENCE_HELP}`)
    .option('--include-initiative <key>', 'Select an initiative as <id>@<archetype> (repeatable)', collect, [])
    .option('--include-policy <key>', 'Select a direct policy as <id>@<archetype> (repeatable)', collect, [])
    .option('--selection <file>', 'YAML/JSON selection file')
    .option('--select-all', 'Select every listed initiative and policy')
    .action(async (options) => {
      const result = await extractCommand(
        {
          source: options.source,
          directory: options.directory,
          output: options.output,
          format: options.format,
          duplicatePreference: options.duplicatePreference,
          includeInitiative: options.includeInitiative,
          includePolicy: options.includePolicy,
          selection: options.selection,
          selectAll: options.selectAll,
        },
        getGlobalContext()
      );
      process.exitCode = result.exitCode;
    });

  program
    .command('recompose <workbook>')
    .description('Regenerate the Policy Breakdown sheet from edited Include cells')
    .option('-o, --output <path>', 'Write to a new file instead of overwriting')
    .action(async (workbook: string, options) => {
      const result = await recomposeCommand(workbook, { output: options.output }, getGlobalContext());
      process.exitCode = result.exitCode;
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
