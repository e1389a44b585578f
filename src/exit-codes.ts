export const EXIT_CODE_OK = 0 as const;
export const EXIT_CODE_NO_SAMPLES = 2 as const;
export const EXIT_CODE_CONFIG_ERROR = 3 as const;
export const EXIT_CODE_INTERNAL_ERROR = 4 as const;

export type ExitCode =
  | typeof EXIT_CODE_OK
  | typeof EXIT_CODE_NO_SAMPLES
  | typeof EXIT_CODE_CONFIG_ERROR
  | typeof EXIT_CODE_INTERNAL_ERROR;

export interface TargetOutcome {
  successes: number;
}

/**
 * A run is clean when every target recorded at least one sample, whether it
 * ended on its attempt limit or on a stop request.
 */
export function exitCodeFromTargetOutcomes(outcomes: readonly TargetOutcome[]): ExitCode {
  return outcomes.some((outcome) => outcome.successes === 0) ? EXIT_CODE_NO_SAMPLES : EXIT_CODE_OK;
}
