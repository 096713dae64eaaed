/**
 * Catalog Builder
 *
 * Drives one pass over the sources:
 *
 *   enumerate archetypes → classify → expand / resolve → collapse duplicates
 *
 * Definitions are fetched one at a time through a per-run DefinitionCache.
 * Only archetype enumeration can fail the run; every other problem is
 * recorded in the RunReport and the affected rows carry flags.
 *
 * @module resolution/catalog-builder
 */

import { ArchetypeEnumerationError, ClassificationError } from '../core/errors.js';
import type {
  Assignment,
  ResolutionFlag,
  ResolvedCatalog,
  ResolvedInitiative,
  ResolvedPolicy,
} from '../core/types.js';
import { createLogger, type ComponentLogger } from '../core/utils/logger.js';
import type { ArchetypeDeclaration, ArchetypeSource, DefinitionSource } from '../providers/types.js';
import { classifyAssignment } from './classifier.js';
import { DefinitionCache, type FetchFailureRecord } from './definition-cache.js';
import { expandInitiative, resolveDirectPolicy } from './expander.js';
import { resolveIdentities, type DuplicatePreference, type DuplicateRecord } from './identity.js';

// ============================================================================
// Types
// ============================================================================

/**
 * An assignment record that could not be classified
 */
export interface SkippedAssignment {
  readonly scope: string;
  readonly assignmentName: string;
  readonly reason: string;
}

export interface MemberCountMismatchRecord {
  readonly initiativeId: string;
  readonly declared: number;
  readonly parsed: number;
}

export type FlagCounts = Readonly<Record<ResolutionFlag, number>>;

/**
 * Everything worth telling the operator about one run
 */
export interface RunReport {
  readonly archetypeCount: number;
  /** Assignment records across all archetypes, including skipped ones */
  readonly assignmentCount: number;
  readonly classifiedCount: number;
  readonly skipped: readonly SkippedAssignment[];
  readonly fetchFailures: readonly FetchFailureRecord[];
  readonly memberCountMismatches: readonly MemberCountMismatchRecord[];
  readonly duplicates: readonly DuplicateRecord[];
  /** Flag occurrences across every listing row */
  readonly flagCounts: FlagCounts;
  /** Source lookups performed (each definition at most once) */
  readonly definitionsFetched: number;
}

export interface BuildResult {
  readonly catalog: ResolvedCatalog;
  readonly report: RunReport;
}

export type BuildPhase = 'classify' | 'resolve';

export interface BuildProgress {
  readonly phase: BuildPhase;
  readonly completed: number;
  readonly total: number;
  /** Assignment being processed */
  readonly current: string;
}

export interface CatalogBuilderOptions {
  readonly duplicatePreference?: DuplicatePreference;
  readonly logger?: ComponentLogger;
  readonly onProgress?: (progress: BuildProgress) => void;
}

/**
 * Whether a report describes a run that completed with something to review
 */
export function hasWarnings(report: RunReport): boolean {
  return (
    report.skipped.length > 0 ||
    report.fetchFailures.length > 0 ||
    report.memberCountMismatches.length > 0 ||
    Object.values(report.flagCounts).some((count) => count > 0)
  );
}

/**
 * Count flags across every listing row of a catalog
 */
export function countFlags(catalog: ResolvedCatalog): FlagCounts {
  const counts: Record<ResolutionFlag, number> = {
    'definition-not-found': 0,
    'nested-initiative': 0,
    'unresolved-parameter': 0,
    'member-count-mismatch': 0,
  };
  const rows: ReadonlyArray<ResolvedInitiative | ResolvedPolicy> = [
    ...catalog.initiatives,
    ...catalog.directPolicies,
    ...catalog.initiativePolicies,
  ];
  for (const row of rows) {
    for (const flag of row.flags) {
      counts[flag]++;
    }
  }
  return counts;
}

// ============================================================================
// Builder
// ============================================================================

export class CatalogBuilder {
  private readonly duplicatePreference: DuplicatePreference;
  private readonly log: ComponentLogger;
  private readonly onProgress: ((progress: BuildProgress) => void) | undefined;

  constructor(
    private readonly archetypeSource: ArchetypeSource,
    private readonly definitionSource: DefinitionSource,
    options: CatalogBuilderOptions = {}
  ) {
    this.duplicatePreference = options.duplicatePreference ?? 'richest';
    this.log = options.logger ?? createLogger({ module: 'catalog-builder' });
    this.onProgress = options.onProgress;
  }

  /**
   * Build the resolved catalog
   *
   * @throws {ArchetypeEnumerationError} When no archetype can be enumerated
   */
  async build(): Promise<BuildResult> {
    const archetypes = await this.enumerateArchetypes();

    const { assignments, skipped, assignmentCount } = this.classifyAll(archetypes);

    const cache = new DefinitionCache(this.definitionSource, this.log);
    const initiatives: ResolvedInitiative[] = [];
    const directPolicies: ResolvedPolicy[] = [];
    const memberCountMismatches: MemberCountMismatchRecord[] = [];

    for (const [index, assignment] of assignments.entries()) {
      this.onProgress?.({
        phase: 'resolve',
        completed: index,
        total: assignments.length,
        current: `${assignment.scope}/${assignment.name}`,
      });

      if (assignment.targetKind === 'Initiative') {
        const { initiative, memberCountMismatch } = await expandInitiative(assignment, cache.lookup);
        initiatives.push(initiative);
        if (memberCountMismatch) {
          this.log.warn(memberCountMismatch.message, { scope: assignment.scope });
          memberCountMismatches.push({
            initiativeId: memberCountMismatch.initiativeId,
            declared: memberCountMismatch.declared,
            parsed: memberCountMismatch.parsed,
          });
        }
      } else {
        directPolicies.push(await resolveDirectPolicy(assignment, cache.lookup));
      }
    }

    const { catalog, duplicates } = resolveIdentities(
      initiatives,
      directPolicies,
      this.duplicatePreference
    );

    for (const duplicate of duplicates) {
      this.log.debug('Collapsed duplicate assignment', { ...duplicate });
    }

    const report: RunReport = {
      archetypeCount: archetypes.length,
      assignmentCount,
      classifiedCount: assignments.length,
      skipped,
      fetchFailures: cache.getFailures(),
      memberCountMismatches,
      duplicates,
      flagCounts: countFlags(catalog),
      definitionsFetched: cache.fetchCount,
    };

    this.log.info('Catalog built', {
      archetypes: report.archetypeCount,
      assignments: report.classifiedCount,
      skipped: report.skipped.length,
      initiatives: catalog.initiatives.length,
      directPolicies: catalog.directPolicies.length,
      initiativePolicies: catalog.initiativePolicies.length,
      definitionsFetched: report.definitionsFetched,
    });

    return { catalog, report };
  }

  private async enumerateArchetypes(): Promise<ArchetypeDeclaration[]> {
    let archetypes: ArchetypeDeclaration[];
    try {
      archetypes = await this.archetypeSource.fetchArchetypes();
    } catch (error) {
      if (error instanceof ArchetypeEnumerationError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ArchetypeEnumerationError(
        `Failed to enumerate archetypes: ${message}`,
        this.archetypeSource.name
      );
    }

    if (archetypes.length === 0) {
      throw new ArchetypeEnumerationError(
        `No archetypes discovered from ${this.archetypeSource.name}`,
        this.archetypeSource.name
      );
    }
    return archetypes;
  }

  private classifyAll(archetypes: readonly ArchetypeDeclaration[]): {
    assignments: Assignment[];
    skipped: SkippedAssignment[];
    assignmentCount: number;
  } {
    const assignments: Assignment[] = [];
    const skipped: SkippedAssignment[] = [];
    const total = archetypes.reduce((sum, archetype) => sum + archetype.assignments.length, 0);
    let completed = 0;

    for (const archetype of archetypes) {
      for (const record of archetype.assignments) {
        this.onProgress?.({
          phase: 'classify',
          completed,
          total,
          current: `${archetype.name}/${record.referenceName}`,
        });
        completed++;

        try {
          assignments.push(classifyAssignment(record, archetype.name));
        } catch (error) {
          if (!(error instanceof ClassificationError)) {
            throw error;
          }
          this.log.warn('Skipping unclassifiable assignment', {
            scope: error.scope,
            assignment: error.assignmentName,
            reason: error.reason,
          });
          skipped.push({
            scope: error.scope,
            assignmentName: error.assignmentName,
            reason: error.reason,
          });
        }
      }
    }

    return { assignments, skipped, assignmentCount: total };
  }
}
