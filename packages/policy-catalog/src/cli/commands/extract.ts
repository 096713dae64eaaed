/**
 * Extract Command
 *
 * Builds the catalog from the configured sources and renders it.
 *
 * Usage:
 *   policy-catalog extract [options]
 *
 * Options:
 *   --source <kind>             remote|directory (default: remote)
 *   --directory <path>          Library root for the directory source
 *   --output <path>             Output file (default: policy_catalog.xlsx)
 *   --format <fmt>              xlsx|json (default: xlsx)
 *   --duplicate-preference <p>  richest|first|last
 *   --include-initiative <key>  Select an initiative (<id>@<archetype>), repeatable
 *   --include-policy <key>      Select a direct policy (<id>@<archetype>), repeatable
 *   --selection <file>          YAML/JSON selection file
 *   --select-all                Select every listed initiative and policy
 *
 * @module cli/commands/extract
 */

import { resolve } from 'node:path';

import { HTTPClient } from '../../core/http-client.js';
import { ArchetypeEnumerationError, ConfigurationError } from '../../core/errors.js';
import type { SelectionSet } from '../../core/types.js';
import type { ComponentLogger } from '../../core/utils/logger.js';
import { LinkBuilder } from '../../links/link-builder.js';
import { AzAdvertizerDefinitionSource } from '../../providers/azadvertizer-definition-source.js';
import { DirectoryArchetypeSource, DirectoryDefinitionSource } from '../../providers/directory-source.js';
import { GitHubArchetypeSource } from '../../providers/github-archetype-source.js';
import { RequestPacer } from '../../providers/request-pacer.js';
import type { ArchetypeSource, DefinitionSource } from '../../providers/types.js';
import { selectAll } from '../../resolution/breakdown.js';
import { CatalogBuilder, hasWarnings, type RunReport } from '../../resolution/catalog-builder.js';
import { JsonSink } from '../../sink/json-sink.js';
import type { CatalogSink, SinkResult } from '../../sink/types.js';
import { WorkbookSink } from '../../sink/workbook-writer.js';
import {
  DuplicatePreferenceSchema,
  OutputFormatSchema,
  parseOption,
  SourceKindSchema,
  type CatalogOutputFormat,
  type CLIConfig,
} from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { formatDuration, type CLILogger } from '../lib/logger.js';
import { formatJson, formatTable, formatters, printError, printOutput, printWarning, type TableColumn } from '../lib/output.js';
import {
  formatSelectionKey,
  loadSelectionFile,
  mergeSelections,
  parseSelectionKey,
} from '../lib/selection.js';

export interface ExtractOptions {
  readonly source?: string;
  readonly directory?: string;
  readonly output?: string;
  readonly format?: string;
  readonly duplicatePreference?: string;
  readonly includeInitiative?: readonly string[];
  readonly includePolicy?: readonly string[];
  readonly selection?: string;
  readonly selectAll?: boolean;
}

export interface ExtractContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

export interface ExtractResult {
  readonly exitCode: ExitCode;
  readonly report?: RunReport;
  readonly output?: SinkResult;
}

export interface CatalogSources {
  readonly archetypes: ArchetypeSource;
  readonly definitions: DefinitionSource;
  /** Pacers to report on after the run */
  readonly pacers: ReadonlyArray<{ readonly name: string; readonly pacer: RequestPacer }>;
}

// ============================================================================
// Wiring
// ============================================================================

/**
 * Sources for a configuration
 *
 * Remote sources share one HTTP client; each host gets its own pacer.
 */
export function createSources(config: CLIConfig, logger: ComponentLogger): CatalogSources {
  if (config.source === 'directory') {
    const root = resolve(config.directory);
    return {
      archetypes: new DirectoryArchetypeSource(root, logger),
      definitions: new DirectoryDefinitionSource(root, logger),
      pacers: [],
    };
  }

  const client = new HTTPClient({
    timeoutMs: config.http.timeoutMs,
    maxRetries: config.http.maxRetries,
  });
  const githubPacer = new RequestPacer({ minIntervalMs: config.github.minIntervalMs });
  const azAdvertizerPacer = new RequestPacer({ minIntervalMs: config.azAdvertizer.minIntervalMs });

  return {
    archetypes: new GitHubArchetypeSource({
      client,
      pacer: githubPacer,
      repo: config.github.repo,
      ref: config.github.ref,
      apiBase: config.github.apiBase,
      archetypePath: config.github.archetypePath,
      assignmentPath: config.github.assignmentPath,
      token: config.github.token,
      logger,
    }),
    definitions: new AzAdvertizerDefinitionSource({
      client,
      pacer: azAdvertizerPacer,
      baseUrl: config.azAdvertizer.baseUrl,
      logger,
    }),
    pacers: [
      { name: 'github', pacer: githubPacer },
      { name: 'azadvertizer', pacer: azAdvertizerPacer },
    ],
  };
}

export function createLinkBuilder(config: CLIConfig): LinkBuilder {
  return new LinkBuilder({
    azAdvertizerBase: config.azAdvertizer.baseUrl,
    repo: config.github.repo,
    ref: config.github.ref,
    assignmentPath: config.github.assignmentPath,
  });
}

export function createSink(
  format: CatalogOutputFormat,
  outputPath: string,
  config: CLIConfig,
  logger: ComponentLogger
): CatalogSink {
  return format === 'json'
    ? new JsonSink({ outputPath, logger })
    : new WorkbookSink({ outputPath, links: createLinkBuilder(config), logger });
}

/**
 * Apply command flags over the loaded configuration
 */
export function applyExtractOptions(config: CLIConfig, options: ExtractOptions): CLIConfig {
  return {
    ...config,
    source: options.source ? parseOption('--source', options.source, SourceKindSchema) : config.source,
    directory: options.directory ?? config.directory,
    resolution: {
      duplicatePreference: options.duplicatePreference
        ? parseOption('--duplicate-preference', options.duplicatePreference, DuplicatePreferenceSchema)
        : config.resolution.duplicatePreference,
    },
    output: {
      path: options.output ?? config.output.path,
      format: options.format ? parseOption('--format', options.format, OutputFormatSchema) : config.output.format,
    },
  };
}

/**
 * Selection given by keys and a selection file (catalog-independent part)
 */
async function requestedSelection(options: ExtractOptions): Promise<SelectionSet> {
  const fromFlags: SelectionSet = {
    initiatives: new Set((options.includeInitiative ?? []).map(parseSelectionKey)),
    policies: new Set((options.includePolicy ?? []).map(parseSelectionKey)),
  };
  if (options.selection === undefined) {
    return fromFlags;
  }
  return mergeSelections(fromFlags, await loadSelectionFile(options.selection));
}

// ============================================================================
// Summary
// ============================================================================

const SUMMARY_COLUMNS: TableColumn[] = [
  { key: 'metric', header: 'Metric' },
  { key: 'value', header: 'Value', align: 'right', formatter: formatters.number },
];

function summaryRows(report: RunReport, output: SinkResult): Array<{ metric: string; value: number }> {
  return [
    { metric: 'Archetypes', value: report.archetypeCount },
    { metric: 'Assignments', value: report.assignmentCount },
    { metric: 'Skipped assignments', value: report.skipped.length },
    { metric: 'Definitions fetched', value: report.definitionsFetched },
    { metric: 'Fetch failures', value: report.fetchFailures.length },
    { metric: 'Member count mismatches', value: report.memberCountMismatches.length },
    { metric: 'Duplicates collapsed', value: report.duplicates.length },
    { metric: 'Definitions not found', value: report.flagCounts['definition-not-found'] },
    { metric: 'Nested initiatives', value: report.flagCounts['nested-initiative'] },
    { metric: 'Unresolved parameters', value: report.flagCounts['unresolved-parameter'] },
    { metric: 'Breakdown rows', value: output.breakdownRows },
  ];
}

function printSummary(report: RunReport, output: SinkResult, json: boolean): void {
  if (json) {
    printOutput(
      formatJson({
        output: output.path,
        breakdownRows: output.breakdownRows,
        unmatchedSelections: output.unmatchedSelections.map(formatSelectionKey),
        report,
      })
    );
    return;
  }

  printOutput(formatTable(summaryRows(report, output), SUMMARY_COLUMNS));

  for (const skipped of report.skipped) {
    printWarning(`Skipped ${skipped.scope}/${skipped.assignmentName || '<unnamed>'}: ${skipped.reason}`);
  }
  for (const failure of report.fetchFailures) {
    printWarning(`Fetch failed for ${failure.kind.toLowerCase()} ${failure.definitionId}: ${failure.message}`);
  }
  for (const mismatch of report.memberCountMismatches) {
    printWarning(
      `Initiative ${mismatch.initiativeId} declares ${mismatch.declared} members, ${mismatch.parsed} parsed`
    );
  }
  for (const key of output.unmatchedSelections) {
    printWarning(`Selection ${formatSelectionKey(key)} matched no catalog row`);
  }
}

// ============================================================================
// Command
// ============================================================================

/**
 * Execute the extract command
 */
export async function extractCommand(
  options: ExtractOptions,
  context: ExtractContext,
  sourcesFactory: (config: CLIConfig, logger: ComponentLogger) => CatalogSources = createSources
): Promise<ExtractResult> {
  const { logger } = context;
  logger.commandStart('extract');

  try {
    const config = applyExtractOptions(context.config, options);
    const requested = await requestedSelection(options);
    const sources = sourcesFactory(config, logger);
    const showProgress = !config.json && process.stderr.isTTY === true;

    const builder = new CatalogBuilder(sources.archetypes, sources.definitions, {
      duplicatePreference: config.resolution.duplicatePreference,
      logger,
      onProgress: showProgress
        ? (progress) =>
            logger.progress({
              total: progress.total,
              current: progress.completed + 1,
              label: `${progress.phase} ${progress.current}`,
            })
        : undefined,
    });
    const { catalog, report } = await builder.build();

    const selection = options.selectAll ? mergeSelections(requested, selectAll(catalog)) : requested;
    const outputPath = resolve(config.output.path);
    const output = await createSink(config.output.format, outputPath, config, logger).render(
      catalog,
      selection
    );

    for (const { name, pacer } of sources.pacers) {
      logger.debug('Request pacing', { source: name, ...pacer.getStats() });
    }

    printSummary(report, output, config.json);

    const warnings = hasWarnings(report) || output.unmatchedSelections.length > 0;
    logger.commandEnd(true, {
      output: output.path,
      warnings,
      elapsed: formatDuration(logger.elapsedMs()),
    });

    return {
      exitCode: warnings ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS,
      report,
      output,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.commandEnd(false, { error: message });

    if (error instanceof ConfigurationError) {
      printError(error.getSummary());
      return { exitCode: EXIT_CODES.CONFIG_ERROR };
    }
    if (error instanceof ArchetypeEnumerationError) {
      printError(message);
      return { exitCode: EXIT_CODES.NETWORK_ERROR };
    }
    printError(`Extraction failed: ${message}`);
    return { exitCode: EXIT_CODES.ERRORS };
  }
}
