/**
 * Policy Catalog CLI Configuration Management
 *
 * Loads configuration from .policy-catalogrc (YAML or JSON) with environment
 * variable overrides and defaults, then validates the merged result with zod.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (POLICY_CATALOG_*, plus GITHUB_TOKEN)
 * 3. Config file (.policy-catalogrc or --config path)
 * 4. Default values
 *
 * Example `.policy-catalogrc`:
 *
 * ```yaml
 * version: 1
 * source: remote
 * github:
 *   ref: main
 * azadvertizer:
 *   minIntervalMs: 250
 * resolution:
 *   duplicatePreference: richest
 * output:
 *   path: ./out/policy_catalog.xlsx
 * ```
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import {
  AZADVERTIZER_BASE,
  AZADVERTIZER_MIN_INTERVAL_MS,
  DEFAULT_ARCHETYPE_PATH,
  DEFAULT_ASSIGNMENT_PATH,
  DEFAULT_LIBRARY_REF,
  DEFAULT_LIBRARY_REPO,
  GITHUB_API_BASE,
  GITHUB_MIN_INTERVAL_MS,
} from '../../core/constants.js';
import { ConfigurationError } from '../../core/errors.js';
import { DUPLICATE_PREFERENCES } from '../../resolution/identity.js';
import { formatIssues } from '../../schemas/raw-documents.js';

// ============================================================================
// Configuration Schema
// ============================================================================

export const SOURCE_KINDS = ['remote', 'directory'] as const;
export const OUTPUT_FORMATS = ['xlsx', 'json'] as const;

export const SourceKindSchema = z.enum(SOURCE_KINDS);
export const OutputFormatSchema = z.enum(OUTPUT_FORMATS);
export const DuplicatePreferenceSchema = z.enum(DUPLICATE_PREFERENCES);

export type SourceKind = z.infer<typeof SourceKindSchema>;
export type CatalogOutputFormat = z.infer<typeof OutputFormatSchema>;

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/**
 * Fully merged CLI configuration
 */
export const CLIConfigSchema = z.object({
  version: z.literal(1),
  source: SourceKindSchema,
  /** Library root for the directory source */
  directory: z.string().min(1),
  github: z.object({
    apiBase: z.string().url(),
    repo: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'must be owner/name'),
    ref: z.string().min(1),
    archetypePath: z.string().min(1),
    assignmentPath: z.string().min(1),
    minIntervalMs: nonNegativeInt,
    token: z.string().min(1).optional(),
  }),
  azAdvertizer: z.object({
    baseUrl: z.string().url(),
    minIntervalMs: nonNegativeInt,
  }),
  http: z.object({
    timeoutMs: positiveInt,
    maxRetries: nonNegativeInt.max(10),
  }),
  resolution: z.object({
    duplicatePreference: DuplicatePreferenceSchema,
  }),
  output: z.object({
    path: z.string().min(1),
    format: OutputFormatSchema,
  }),
  verbose: z.boolean(),
  json: z.boolean(),
  configPath: z.string().nullable(),
});

export type CLIConfig = z.infer<typeof CLIConfigSchema>;

/**
 * Config file structure; every key optional
 */
const ConfigFileSchema = z
  .object({
    version: z.number().optional(),
    source: z.string().optional(),
    directory: z.string().optional(),
    github: z
      .object({
        apiBase: z.string().optional(),
        repo: z.string().optional(),
        ref: z.string().optional(),
        archetypePath: z.string().optional(),
        assignmentPath: z.string().optional(),
        minIntervalMs: z.number().optional(),
      })
      .optional(),
    azadvertizer: z
      .object({
        baseUrl: z.string().optional(),
        minIntervalMs: z.number().optional(),
      })
      .optional(),
    http: z
      .object({
        timeoutMs: z.number().optional(),
        maxRetries: z.number().optional(),
      })
      .optional(),
    resolution: z
      .object({
        duplicatePreference: z.string().optional(),
      })
      .optional(),
    output: z
      .object({
        path: z.string().optional(),
        format: z.string().optional(),
      })
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  source: 'remote',
  directory: './library',
  github: {
    apiBase: GITHUB_API_BASE,
    repo: DEFAULT_LIBRARY_REPO,
    ref: DEFAULT_LIBRARY_REF,
    archetypePath: DEFAULT_ARCHETYPE_PATH,
    assignmentPath: DEFAULT_ASSIGNMENT_PATH,
    minIntervalMs: GITHUB_MIN_INTERVAL_MS,
  },
  azAdvertizer: {
    baseUrl: AZADVERTIZER_BASE,
    minIntervalMs: AZADVERTIZER_MIN_INTERVAL_MS,
  },
  http: {
    timeoutMs: 30000,
    maxRetries: 3,
  },
  resolution: {
    duplicatePreference: 'richest',
  },
  output: {
    path: 'policy_catalog.xlsx',
    format: 'xlsx',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.policy-catalogrc',
  '.policy-catalogrc.yaml',
  '.policy-catalogrc.yml',
  '.policy-catalogrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate a config file (YAML also reads plain JSON)
 */
function parseConfigFile(filePath: string): ConfigFile {
  let document: unknown;
  try {
    document = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file parses to null
  const parsed = ConfigFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${filePath}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Reads POLICY_CATALOG_* variables
 *
 * Malformed numbers and booleans are passed through as strings so that
 * validation reports them instead of silently using a default.
 */
class EnvReader {
  constructor(private readonly env: Environment) {}

  string(name: string): string | undefined {
    const value = this.env[`POLICY_CATALOG_${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  number(name: string): number | string | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    return Number.isFinite(num) ? num : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly timeout?: number;
  };
  /** Environment (default: process.env) */
  readonly env?: Environment;
  /** Directory the config file search starts from (default: process.cwd()) */
  readonly cwd?: string;
}

/**
 * Load, merge and validate configuration from all sources
 *
 * @throws {ConfigurationError} When the file or merged values are invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const vars = new EnvReader(env);

  let configPath: string | null = null;
  let file: ConfigFile = {};

  const explicitPath = options.configPath ?? vars.string('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    file = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      file = parseConfigFile(configPath);
    }
  }

  const merged = {
    version: file.version ?? DEFAULT_CONFIG.version,
    source: vars.string('SOURCE') ?? file.source ?? DEFAULT_CONFIG.source,
    directory: vars.string('DIRECTORY') ?? file.directory ?? DEFAULT_CONFIG.directory,
    github: {
      apiBase: vars.string('GITHUB_API_BASE') ?? file.github?.apiBase ?? DEFAULT_CONFIG.github.apiBase,
      repo: vars.string('GITHUB_REPO') ?? file.github?.repo ?? DEFAULT_CONFIG.github.repo,
      ref: vars.string('GITHUB_REF') ?? file.github?.ref ?? DEFAULT_CONFIG.github.ref,
      archetypePath: file.github?.archetypePath ?? DEFAULT_CONFIG.github.archetypePath,
      assignmentPath: file.github?.assignmentPath ?? DEFAULT_CONFIG.github.assignmentPath,
      minIntervalMs:
        vars.number('GITHUB_MIN_INTERVAL_MS') ??
        file.github?.minIntervalMs ??
        DEFAULT_CONFIG.github.minIntervalMs,
      token: env.GITHUB_TOKEN || undefined,
    },
    azAdvertizer: {
      baseUrl:
        vars.string('AZADVERTIZER_BASE') ?? file.azadvertizer?.baseUrl ?? DEFAULT_CONFIG.azAdvertizer.baseUrl,
      minIntervalMs:
        vars.number('AZADVERTIZER_MIN_INTERVAL_MS') ??
        file.azadvertizer?.minIntervalMs ??
        DEFAULT_CONFIG.azAdvertizer.minIntervalMs,
    },
    http: {
      timeoutMs:
        options.overrides?.timeout ??
        vars.number('TIMEOUT') ??
        file.http?.timeoutMs ??
        DEFAULT_CONFIG.http.timeoutMs,
      maxRetries: vars.number('MAX_RETRIES') ?? file.http?.maxRetries ?? DEFAULT_CONFIG.http.maxRetries,
    },
    resolution: {
      duplicatePreference:
        vars.string('DUPLICATE_PREFERENCE') ??
        file.resolution?.duplicatePreference ??
        DEFAULT_CONFIG.resolution.duplicatePreference,
    },
    output: {
      path: vars.string('OUTPUT') ?? file.output?.path ?? DEFAULT_CONFIG.output.path,
      format: vars.string('FORMAT') ?? file.output?.format ?? DEFAULT_CONFIG.output.format,
    },
    verbose: options.overrides?.verbose ?? vars.bool('VERBOSE') ?? false,
    json: options.overrides?.json ?? vars.bool('JSON') ?? false,
    configPath,
  };

  const parsed = CLIConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid configuration${configPath ? ` (${configPath})` : ''}`,
      formatIssues(parsed.error)
    );
  }
  return parsed.data;
}

/**
 * Validate a CLI flag value against an option schema
 *
 * @throws {ConfigurationError} Naming the flag and the accepted values
 */
export function parseOption<T extends string>(
  flag: string,
  value: string,
  schema: z.ZodEnum<[T, ...T[]]>
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid value '${value}' for ${flag}. Expected one of: ${schema.options.join(', ')}`
    );
  }
  return parsed.data;
}

/** Accepted duplicate preferences, for help text */
export const DUPLICATE_PREFERENCE_HELP = DUPLICATE_PREFERENCES.join('|');
