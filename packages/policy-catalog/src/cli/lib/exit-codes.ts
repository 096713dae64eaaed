/**
 * Process exit codes shared by the CLI entry point and its commands
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Completed, with skipped assignments, flagged rows or unmatched selections */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  /** No archetypes could be enumerated */
  NETWORK_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
