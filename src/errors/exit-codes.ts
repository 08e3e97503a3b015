import { ConfigError, TagesschauError, UsageError } from './custom-errors';

/**
 * Process exit codes, one per failure category (sysexits.h numbering where one exists)
 */
export const ExitCode = {
  SUCCESS: 0,
  RUNTIME: 1,
  USAGE: 64,
  INTERNAL: 70,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Map an error that reached the command boundary to its exit code.
 * Remote, availability and download failures are runtime errors; anything that
 * is not one of ours is a bug.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UsageError || error instanceof ConfigError) {
    return ExitCode.USAGE;
  }
  if (error instanceof TagesschauError) {
    return ExitCode.RUNTIME;
  }
  return ExitCode.INTERNAL;
}
