/**
 * Policy Catalog - cross-scope catalog of landing-zone policy assignments
 *
 * policy-catalog provides:
 * - Classification of archetype assignments as policies or initiatives
 * - Single-level initiative expansion with parameter layering
 * - Scope-aware identity and the cross-scope breakdown view
 * - GitHub, AzAdvertizer and local-directory sources
 * - Workbook and JSON sinks, with workbook recomposition
 *
 * @packageDocumentation
 */

// Domain types
export type {
  Assignment,
  BreakdownRow,
  Definition,
  DefinitionIdentityKey,
  EnforcementMode,
  InitiativeDefinition,
  InitiativeMember,
  ParameterSchema,
  ParameterSchemaEntry,
  ParameterValues,
  PolicyDefinition,
  ResolutionFlag,
  ResolvedCatalog,
  ResolvedInitiative,
  ResolvedPolicy,
  ScopedIdentityKey,
  SelectionSet,
  TargetKind,
} from './core/types.js';

// Errors
export {
  ArchetypeEnumerationError,
  ClassificationError,
  ConfigurationError,
  FetchFailure,
  InconsistentMemberCount,
  WorkbookFormatError,
} from './core/errors.js';

// Resolution core
export { classifyAssignment, normalizeEnforcementMode, parseTargetKind } from './resolution/classifier.js';
export {
  expandInitiative,
  resolveDirectPolicy,
  type DefinitionLookup,
  type InitiativeExpansion,
} from './resolution/expander.js';
export { resolveEffect, resolveDirectParameters, resolveMemberParameters } from './resolution/parameters.js';
export {
  compareText,
  definitionIdentityKey,
  DUPLICATE_PREFERENCES,
  initiativeKey,
  policyKey,
  resolveIdentities,
  scopedIdentityKey,
  summarizeByDefinition,
  type DefinitionSummary,
  type DuplicatePreference,
  type DuplicateRecord,
  type IdentityResolution,
} from './resolution/identity.js';
export {
  composeBreakdown,
  emptySelection,
  selectAll,
  selectionFromKeys,
  type BreakdownResult,
} from './resolution/breakdown.js';
export { DefinitionCache, type FetchFailureRecord } from './resolution/definition-cache.js';
export {
  CatalogBuilder,
  hasWarnings,
  type BuildProgress,
  type BuildResult,
  type CatalogBuilderOptions,
  type RunReport,
} from './resolution/catalog-builder.js';

// Sources
export type {
  ArchetypeDeclaration,
  ArchetypeSource,
  DefinitionSource,
  RawAssignmentRecord,
} from './providers/types.js';
export { GitHubArchetypeSource, type GitHubArchetypeSourceOptions } from './providers/github-archetype-source.js';
export {
  AzAdvertizerDefinitionSource,
  type AzAdvertizerDefinitionSourceOptions,
} from './providers/azadvertizer-definition-source.js';
export { DirectoryArchetypeSource, DirectoryDefinitionSource } from './providers/directory-source.js';
export { RequestPacer, type RequestPacerConfig } from './providers/request-pacer.js';
export { HTTPClient, type HTTPClientConfig } from './core/http-client.js';

// Links & sinks
export { LinkBuilder, type LinkBuilderOptions } from './links/link-builder.js';
export type { CatalogSink, SinkResult } from './sink/types.js';
export { WorkbookSink, buildCatalogWorkbook } from './sink/workbook-writer.js';
export { readCatalogWorkbook, recomposeWorkbookFile, type RecomposeResult } from './sink/workbook-reader.js';
export { JsonSink } from './sink/json-sink.js';

// Logging
export { createLogger, silentLogger, type ComponentLogger } from './core/utils/logger.js';
