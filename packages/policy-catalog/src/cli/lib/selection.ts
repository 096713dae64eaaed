/**
 * Breakdown selection from CLI flags and selection files
 *
 * A selection key names one assignment of a definition at one archetype:
 *
 *   <definition id or resource path>@<archetype>
 *
 * The split happens at the last '@', so identifiers containing '@' still work.
 * Selection files are YAML or JSON:
 *
 * ```yaml
 * initiatives:
 *   - Deploy-MDFC-Config@root
 *   - { id: Enforce-Guardrails-KeyVault, scope: landing_zones }
 * policies:
 *   - Deny-Public-IP@corp
 * ```
 *
 * @module cli/lib/selection
 */

import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigurationError } from '../../core/errors.js';
import { extractDefinitionId } from '../../core/resource-path.js';
import type { ScopedIdentityKey, SelectionSet } from '../../core/types.js';
import { scopedIdentityKey } from '../../resolution/identity.js';
import { formatIssues } from '../../schemas/raw-documents.js';

const SelectionEntrySchema = z.union([
  z.string(),
  z.object({ id: z.string(), scope: z.string() }).strict(),
]);

export const SelectionFileSchema = z
  .object({
    initiatives: z.array(SelectionEntrySchema).default([]),
    policies: z.array(SelectionEntrySchema).default([]),
  })
  .strict();

type SelectionEntry = z.infer<typeof SelectionEntrySchema>;

/**
 * Scoped key for an (id, scope) pair typed by a user
 *
 * @throws {ConfigurationError} When the id or the scope is empty
 */
export function selectionKey(id: string, scope: string): ScopedIdentityKey {
  const definitionId = extractDefinitionId(id);
  const archetype = scope.trim();
  if (definitionId.length === 0 || archetype.length === 0) {
    throw new ConfigurationError(`Invalid selection '${id}@${scope}': expected <definition id>@<archetype>`);
  }
  return scopedIdentityKey(definitionId, archetype);
}

/**
 * Parse an `id@scope` selection key
 *
 * @throws {ConfigurationError} When the key has no '@' or an empty side
 */
export function parseSelectionKey(text: string): ScopedIdentityKey {
  const at = text.lastIndexOf('@');
  if (at < 0) {
    throw new ConfigurationError(`Invalid selection '${text}': expected <definition id>@<archetype>`);
  }
  return selectionKey(text.slice(0, at), text.slice(at + 1));
}

function entryKey(entry: SelectionEntry): ScopedIdentityKey {
  return typeof entry === 'string' ? parseSelectionKey(entry) : selectionKey(entry.id, entry.scope);
}

/**
 * Parse a selection document (already decoded from YAML or JSON)
 */
export function parseSelectionDocument(document: unknown, origin = 'selection'): SelectionSet {
  const parsed = SelectionFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${origin}`, formatIssues(parsed.error));
  }
  return {
    initiatives: new Set(parsed.data.initiatives.map(entryKey)),
    policies: new Set(parsed.data.policies.map(entryKey)),
  };
}

/**
 * Load a YAML or JSON selection file
 */
export async function loadSelectionFile(path: string): Promise<SelectionSet> {
  let document: unknown;
  try {
    document = parseYaml(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read selection file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseSelectionDocument(document, `selection file ${path}`);
}

/**
 * `id@scope` form of a scoped key, for messages
 */
export function formatSelectionKey(key: ScopedIdentityKey): string {
  const body = key.slice('scoped:'.length);
  const bar = body.indexOf('|');
  return `${decodeURIComponent(body.slice(0, bar))}@${decodeURIComponent(body.slice(bar + 1))}`;
}

/**
 * Union of selections
 */
export function mergeSelections(...selections: readonly SelectionSet[]): SelectionSet {
  return {
    initiatives: new Set(selections.flatMap((selection) => [...selection.initiatives])),
    policies: new Set(selections.flatMap((selection) => [...selection.policies])),
  };
}
