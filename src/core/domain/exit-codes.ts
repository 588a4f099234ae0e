/**
 * Process exit statuses. Schedulers rely on these values; do not renumber.
 */
export const EXIT_CODES = {
  success: 0,
  configurationError: 1,
  toolFailure: 2,
  executionError: 3,
  notificationFailed: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
