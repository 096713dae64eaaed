/**
 * Policy Catalog Constants
 *
 * Source locations and pacing defaults for the Enterprise-Scale Landing Zone
 * library and AzAdvertizer.
 */

// ============================================================================
// Remote Sources
// ============================================================================

export const GITHUB_API_BASE = 'https://api.github.com';
export const GITHUB_WEB_BASE = 'https://github.com';

/** Terraform module carrying the archetype library */
export const DEFAULT_LIBRARY_REPO = 'Azure/terraform-azurerm-caf-enterprise-scale';
export const DEFAULT_LIBRARY_REF = 'main';
export const DEFAULT_ARCHETYPE_PATH = 'modules/archetypes/lib/archetype_definitions';
export const DEFAULT_ASSIGNMENT_PATH = 'modules/archetypes/lib/policy_assignments';

export const AZADVERTIZER_BASE = 'https://www.azadvertizer.net';

/** Minimum gap between AzAdvertizer requests */
export const AZADVERTIZER_MIN_INTERVAL_MS = 200;

/** Minimum gap between GitHub requests */
export const GITHUB_MIN_INTERVAL_MS = 100;

export const USER_AGENT = 'Policy-Catalog/1.0';

// ============================================================================
// Document Shapes
// ============================================================================

/** Resource type segment marking an initiative target */
export const POLICY_SET_SEGMENT = 'policySetDefinitions';

/** Resource type segment marking a policy target */
export const POLICY_SEGMENT = 'policyDefinitions';

/** Stand-in for `${...}` terraform template placeholders */
export const TEMPLATE_PLACEHOLDER = 'TEMPLATE_VAR';

/** Archetype files with this marker declare no assignments */
export const EMPTY_ARCHETYPE_MARKER = 'default_empty';

export const ASSIGNMENT_FILE_PREFIX = 'policy_assignment_es_';

/** Effect shown when the rule's effect is a reference with no default */
export const PARAMETERIZED_EFFECT = 'Parameterized';

/** Effect shown when the rule's effect is not a string */
export const UNKNOWN_EFFECT = 'Unknown';
