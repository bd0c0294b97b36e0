/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  INVALID_ARGS: 2,
  CONFIG_INVALID: 3,
  LEDGER_CONFLICT: 4,
} as const;
