/**
 * Archetype Library Conventions
 *
 * File-level rules of the Enterprise-Scale archetype library, shared by the
 * GitHub and local directory sources:
 *
 * - archetype files are `*.json` / `*.tmpl.json` mapping archetype name to
 *   `{ policy_assignments: string[] }`; files marked `default_empty` are skipped
 * - terraform `${...}` placeholders are replaced before JSON parsing
 * - assignment `Deploy-MDFC-Config` lives in
 *   `policy_assignment_es_deploy_mdfc_config(.tmpl).json`
 */

import { ASSIGNMENT_FILE_PREFIX, EMPTY_ARCHETYPE_MARKER, TEMPLATE_PLACEHOLDER } from '../core/constants.js';
import { RawArchetypeFileSchema, formatIssues } from '../schemas/raw-documents.js';

const TEMPLATE_EXPRESSION = /\$\{[^}]+\}/g;

/**
 * Replace terraform template expressions with a fixed placeholder
 */
export function substituteTemplatePlaceholders(content: string): string {
  return content.replace(TEMPLATE_EXPRESSION, TEMPLATE_PLACEHOLDER);
}

/**
 * Whether a library file name is an archetype definition worth reading
 */
export function isArchetypeFileName(fileName: string): boolean {
  return fileName.endsWith('.json') && !fileName.includes(EMPTY_ARCHETYPE_MARKER);
}

/**
 * Parse library JSON after template substitution
 *
 * @throws {SyntaxError} When the content is not JSON
 */
export function parseLibraryJSON(content: string): unknown {
  const parsed: unknown = JSON.parse(substituteTemplatePlaceholders(content));
  return parsed;
}

export type ArchetypeFileParseResult =
  | { readonly success: true; readonly archetypes: ReadonlyMap<string, readonly string[]> }
  | { readonly success: false; readonly error: string };

/**
 * Archetype name → declared assignment names, in file order
 */
export function parseArchetypeFile(content: string): ArchetypeFileParseResult {
  let document: unknown;
  try {
    document = parseLibraryJSON(content);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }

  const parsed = RawArchetypeFileSchema.safeParse(document);
  if (!parsed.success) {
    return { success: false, error: formatIssues(parsed.error).join('; ') };
  }

  const archetypes = new Map<string, readonly string[]>();
  for (const [name, declaration] of Object.entries(parsed.data)) {
    archetypes.set(name, declaration.policy_assignments ?? []);
  }
  return { success: true, archetypes };
}

/**
 * Conventional file names for an assignment, preferred first
 */
export function assignmentFileCandidates(assignmentName: string): string[] {
  const stem = `${ASSIGNMENT_FILE_PREFIX}${assignmentName.toLowerCase().replace(/-/g, '_')}`;
  return [`${stem}.tmpl.json`, `${stem}.json`];
}

/**
 * Locate the file declaring `assignmentName` among `fileNames`
 *
 * Tries the conventional names first, then compares the stem of every file
 * with underscores read as dashes, ignoring case.
 */
export function matchAssignmentFile(
  assignmentName: string,
  fileNames: readonly string[]
): string | null {
  const available = new Set(fileNames);
  for (const candidate of assignmentFileCandidates(assignmentName)) {
    if (available.has(candidate)) {
      return candidate;
    }
  }

  const wanted = assignmentName.toLowerCase();
  for (const fileName of fileNames) {
    const stem = fileName
      .replace(ASSIGNMENT_FILE_PREFIX, '')
      .replace(/\.tmpl\.json$/, '')
      .replace(/\.json$/, '')
      .replace(/_/g, '-');
    if (stem.toLowerCase() === wanted) {
      return fileName;
    }
  }
  return null;
}
