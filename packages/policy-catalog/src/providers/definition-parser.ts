/**
 * Definition Parser
 *
 * Normalizes a raw policy or policy set document into a Definition. Shared by
 * every source so remote pages and local files resolve identically.
 *
 * A document is an initiative when it carries a `policyDefinitions` array or
 * its resource id names a policy set. The identifier of the result is always
 * the identifier it was requested under.
 */

import { inferKindFromPath, extractDefinitionId } from '../core/resource-path.js';
import { isRecord } from '../core/type-guards.js';
import type {
  Definition,
  InitiativeMember,
  ParameterSchema,
  ParameterSchemaEntry,
} from '../core/types.js';
import { unwrapParameterValues } from '../resolution/parameters.js';
import {
  RawDefinitionDocumentSchema,
  RawDefinitionPropertiesSchema,
  RawInitiativeMemberSchema,
  RawParameterEntrySchema,
  formatIssues,
  type RawDefinitionProperties,
} from '../schemas/raw-documents.js';

export type DefinitionParseResult =
  | { readonly success: true; readonly definition: Definition }
  | { readonly success: false; readonly error: string };

/**
 * Parse a raw definition document fetched for `definitionId`
 */
export function parseDefinitionDocument(
  document: unknown,
  definitionId: string
): DefinitionParseResult {
  const parsed = RawDefinitionDocumentSchema.safeParse(document);
  if (!parsed.success) {
    return { success: false, error: formatIssues(parsed.error).join('; ') };
  }

  let properties: RawDefinitionProperties;
  if (parsed.data.properties !== undefined) {
    properties = parsed.data.properties;
  } else {
    // Bare properties object
    const bare = RawDefinitionPropertiesSchema.safeParse(document);
    if (!bare.success) {
      return { success: false, error: formatIssues(bare.error).join('; ') };
    }
    properties = bare.data;
  }

  const base = {
    id: definitionId,
    displayName: properties.displayName?.trim() || definitionId,
    description: properties.description ?? '',
    category: metadataText(properties.metadata?.category),
    version: metadataText(properties.metadata?.version),
    policyType: properties.policyType ?? '',
    parameters: parseParameterSchema(properties.parameters),
  };

  const resourceId = parsed.data.id ?? '';
  const isInitiative =
    properties.policyDefinitions !== undefined || inferKindFromPath(resourceId) === 'Initiative';

  if (isInitiative) {
    const entries = properties.policyDefinitions ?? [];
    return {
      success: true,
      definition: {
        ...base,
        kind: 'Initiative',
        members: parseMembers(entries),
        declaredMemberCount: entries.length,
      },
    };
  }

  return {
    success: true,
    definition: {
      ...base,
      kind: 'Policy',
      effectExpression: properties.policyRule?.then?.effect,
    },
  };
}

/**
 * Category and version are strings in practice but numbers do appear
 */
function metadataText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function parseParameterSchema(raw: Readonly<Record<string, unknown>> | undefined): ParameterSchema {
  const schema: Record<string, ParameterSchemaEntry> = {};
  if (!raw) {
    return schema;
  }

  for (const [name, entry] of Object.entries(raw)) {
    const parsed = RawParameterEntrySchema.safeParse(entry);
    if (!parsed.success) {
      // Unreadable entry: the name is still a declared parameter
      schema[name] = {};
      continue;
    }
    schema[name] = {
      type: parsed.data.type,
      defaultValue: parsed.data.defaultValue,
      allowedValues: parsed.data.allowedValues,
      displayName: parsed.data.metadata?.displayName,
    };
  }
  return schema;
}

/**
 * Members that parse, in declaration order
 *
 * Entries without a usable policy reference are dropped here; the declared
 * count keeps the raw length so the expander can flag the difference.
 */
function parseMembers(entries: readonly unknown[]): InitiativeMember[] {
  const members: InitiativeMember[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    const parsed = RawInitiativeMemberSchema.safeParse(entry);
    if (!parsed.success) continue;

    const policyId = extractDefinitionId(parsed.data.policyDefinitionId);
    if (policyId.length === 0) continue;

    members.push({
      policyDefinitionPath: parsed.data.policyDefinitionId,
      policyId,
      referenceId: parsed.data.policyDefinitionReferenceId?.trim() || policyId,
      parameters: unwrapParameterValues(parsed.data.parameters),
    });
  }

  return members;
}
