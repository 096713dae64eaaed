/**
 * Raw Document Schemas
 *
 * Zod schemas for the ARM-shaped JSON documents the sources hand to the core:
 * policy assignments, policy definitions and policy set (initiative)
 * definitions. Schemas are deliberately loose (passthrough, mostly optional)
 * because published documents vary; the resolution code decides what a
 * missing field means.
 */

import { z } from 'zod';

// ============================================================================
// Assignments
// ============================================================================

/**
 * Assignment properties block
 */
export const RawAssignmentPropertiesSchema = z
  .object({
    displayName: z.string().optional(),
    description: z.string().optional(),
    policyDefinitionId: z.string().optional(),
    enforcementMode: z.string().optional(),
    parameters: z.record(z.unknown()).optional(),
  })
  .passthrough();

/**
 * Policy assignment document
 *
 * `targetKind` is an explicit discriminator some sources attach when the
 * definition path alone does not say what the target is.
 */
export const RawAssignmentDocumentSchema = z
  .object({
    name: z.string().optional(),
    targetKind: z.string().optional(),
    properties: RawAssignmentPropertiesSchema.optional(),
  })
  .passthrough();

export type RawAssignmentDocument = z.infer<typeof RawAssignmentDocumentSchema>;

// ============================================================================
// Definitions
// ============================================================================

/**
 * Parameter schema entry of a policy or initiative definition
 */
export const RawParameterEntrySchema = z
  .object({
    type: z.string().optional(),
    defaultValue: z.unknown().optional(),
    allowedValues: z.array(z.unknown()).optional(),
    metadata: z
      .object({
        displayName: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/**
 * Definition metadata block (category/version are free-form in the wild)
 */
export const RawDefinitionMetadataSchema = z
  .object({
    category: z.unknown().optional(),
    version: z.unknown().optional(),
  })
  .passthrough();

/**
 * Member entry of an initiative's `policyDefinitions` array
 */
export const RawInitiativeMemberSchema = z
  .object({
    policyDefinitionId: z.string().min(1),
    policyDefinitionReferenceId: z.string().optional(),
    parameters: z.record(z.unknown()).optional(),
  })
  .passthrough();

/**
 * Definition properties block shared by policies and initiatives
 */
export const RawDefinitionPropertiesSchema = z
  .object({
    displayName: z.string().optional(),
    description: z.string().optional(),
    policyType: z.string().optional(),
    metadata: RawDefinitionMetadataSchema.optional(),
    parameters: z.record(z.unknown()).optional(),
    policyRule: z
      .object({
        then: z
          .object({
            effect: z.unknown().optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .optional(),
    /** Present only on initiatives; entries are validated one by one */
    policyDefinitions: z.array(z.unknown()).optional(),
  })
  .passthrough();

/**
 * Definition document: `{ name, properties }` or a bare properties object
 */
export const RawDefinitionDocumentSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    properties: RawDefinitionPropertiesSchema.optional(),
  })
  .passthrough();

export type RawDefinitionProperties = z.infer<typeof RawDefinitionPropertiesSchema>;
export type RawDefinitionDocument = z.infer<typeof RawDefinitionDocumentSchema>;

// ============================================================================
// Archetypes
// ============================================================================

/**
 * Archetype definition file: archetype name → declaration
 */
export const RawArchetypeFileSchema = z.record(
  z
    .object({
      policy_assignments: z.array(z.string()).optional(),
    })
    .passthrough()
);

export type RawArchetypeFile = z.infer<typeof RawArchetypeFileSchema>;

/**
 * Summarize zod issues as `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
