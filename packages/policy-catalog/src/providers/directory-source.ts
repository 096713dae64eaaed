/**
 * Local Directory Sources
 *
 * Offline counterparts of the GitHub and AzAdvertizer sources, reading the
 * same documents from disk:
 *
 * ```
 * <root>/archetypes/*.json                 archetype definition files
 * <root>/assignments/*.json                policy assignment files
 * <root>/definitions/policies/<id>.json    policy definitions
 * <root>/definitions/initiatives/<id>.json policy set definitions
 * ```
 *
 * File names follow the archetype library conventions, so a checkout of the
 * terraform module's `lib` folders can be copied in as-is.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';

import { FetchFailure } from '../core/errors.js';
import type { Definition, TargetKind } from '../core/types.js';
import { createLogger, type ComponentLogger } from '../core/utils/logger.js';
import {
  isArchetypeFileName,
  matchAssignmentFile,
  parseArchetypeFile,
  parseLibraryJSON,
} from './archetype-library.js';
import { parseDefinitionDocument } from './definition-parser.js';
import type {
  ArchetypeDeclaration,
  ArchetypeSource,
  DefinitionSource,
  RawAssignmentRecord,
} from './types.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Sorted `.json` file names in a directory ([] when it does not exist)
 */
async function listJSONFiles(directory: string): Promise<string[]> {
  try {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
}

// ============================================================================
// Archetypes
// ============================================================================

export class DirectoryArchetypeSource implements ArchetypeSource {
  readonly name = 'directory';
  private readonly log: ComponentLogger;

  constructor(
    private readonly root: string,
    logger?: ComponentLogger
  ) {
    this.log = logger ?? createLogger({ module: 'directory-source' });
  }

  async fetchArchetypes(): Promise<ArchetypeDeclaration[]> {
    const archetypeDir = join(this.root, 'archetypes');
    const assignmentDir = join(this.root, 'assignments');

    const declared = new Map<string, readonly string[]>();
    for (const fileName of await listJSONFiles(archetypeDir)) {
      if (!isArchetypeFileName(fileName)) continue;

      const parsed = parseArchetypeFile(await readFile(join(archetypeDir, fileName), 'utf-8'));
      if (!parsed.success) {
        this.log.warn('Skipping unreadable archetype file', { file: fileName, error: parsed.error });
        continue;
      }
      for (const [archetype, assignments] of parsed.archetypes) {
        if (assignments.length > 0) {
          declared.set(archetype, assignments);
        }
      }
    }

    const assignmentFiles = await listJSONFiles(assignmentDir);
    const records = new Map<string, RawAssignmentRecord>();

    const archetypes: ArchetypeDeclaration[] = [];
    for (const [archetype, assignmentNames] of declared) {
      const assignments: RawAssignmentRecord[] = [];
      for (const assignmentName of assignmentNames) {
        let record = records.get(assignmentName);
        if (record === undefined) {
          record = await this.readAssignment(assignmentDir, assignmentName, assignmentFiles);
          records.set(assignmentName, record);
        }
        assignments.push(record);
      }
      archetypes.push({ name: archetype, assignments });
    }

    return archetypes;
  }

  private async readAssignment(
    directory: string,
    assignmentName: string,
    fileNames: readonly string[]
  ): Promise<RawAssignmentRecord> {
    const fileName = matchAssignmentFile(assignmentName, fileNames);
    if (fileName === null) {
      this.log.warn('Could not find file for assignment', { assignmentName });
      return { referenceName: assignmentName, document: null, sourceUrl: '' };
    }

    const path = join(directory, fileName);
    const sourceUrl = pathToFileURL(path).href;
    try {
      const document = parseLibraryJSON(await readFile(path, 'utf-8'));
      return { referenceName: assignmentName, document, sourceUrl };
    } catch (error) {
      this.log.warn('Failed to read assignment file', {
        assignmentName,
        file: fileName,
        error: toError(error).message,
      });
      return { referenceName: assignmentName, document: null, sourceUrl };
    }
  }
}

// ============================================================================
// Definitions
// ============================================================================

export class DirectoryDefinitionSource implements DefinitionSource {
  readonly name = 'directory';
  private readonly log: ComponentLogger;

  constructor(
    private readonly root: string,
    logger?: ComponentLogger
  ) {
    this.log = logger ?? createLogger({ module: 'directory-source' });
  }

  definitionPath(definitionId: string, kind: TargetKind): string {
    const folder = kind === 'Initiative' ? 'initiatives' : 'policies';
    return join(this.root, 'definitions', folder, `${definitionId}.json`);
  }

  async fetchDefinition(definitionId: string, kind: TargetKind): Promise<Definition | null> {
    // Identifiers never contain separators; refuse anything that would leave the tree
    if (/[\\/]/.test(definitionId) || definitionId === '.' || definitionId === '..') {
      return null;
    }

    const path = this.definitionPath(definitionId, kind);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new FetchFailure(definitionId, kind, pathToFileURL(path).href, toError(error));
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new FetchFailure(definitionId, kind, pathToFileURL(path).href, toError(error));
    }

    const parsed = parseDefinitionDocument(document, definitionId);
    if (!parsed.success) {
      this.log.warn('Definition file is malformed', { definitionId, kind, error: parsed.error });
      return null;
    }
    return parsed.definition;
  }
}
