/**
 * Shared CLI command plumbing
 *
 * Commands return their output and exit code instead of printing and
 * exiting, so they can be exercised without a process boundary.
 */

import type { CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  INVALID_PROOF: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
}

export interface CommandResult {
  readonly exitCode: ExitCode;
  /** Text for stdout */
  readonly output: string;
}

/**
 * Run a command body with start/end logging, print its output, and set the
 * process exit code. Errors are reported in the configured output format.
 */
export async function runCommand(
  context: CommandContext,
  name: string,
  body: () => Promise<CommandResult>
): Promise<void> {
  context.logger.commandStart(name);

  try {
    const result = await body();
    console.log(result.output);
    context.logger.commandEnd(true, { exitCode: result.exitCode });
    process.exitCode = result.exitCode;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (context.config.json) {
      console.log(JSON.stringify({ error: message }));
    } else {
      console.error(`\nError: ${message}`);
    }
    context.logger.commandEnd(false, { error: message });
    process.exitCode = EXIT_CODES.ERRORS;
  }
}
