/**
 * Hash Command
 *
 * Print the leaf digest of a record.
 *
 * Usage:
 *   merkle-audit hash <data> [--algorithm <name>] [--encoding <name>] [--no-security]
 */

import type { Command } from 'commander';
import { HashEngine } from '../../hashing/hash-engine.js';
import { decodeBytes, encodeText } from '../../hashing/encoding.js';
import { EXIT_CODES, runCommand, type CommandContext, type CommandResult } from '../lib/context.js';

export interface HashCommandOptions {
  readonly algorithm?: string;
  readonly encoding?: string;
  /** Only `false` overrides the configured security mode */
  readonly security?: boolean;
}

/**
 * Execute the hash command
 */
export async function executeHash(
  data: string,
  options: HashCommandOptions,
  context: CommandContext
): Promise<CommandResult> {
  const engine = new HashEngine({
    ...context.config.hashing,
    algorithm: options.algorithm ?? context.config.hashing.algorithm,
    encoding: options.encoding ?? context.config.hashing.encoding,
    security: options.security === false ? false : context.config.hashing.security,
  });

  const digest = decodeBytes(engine.hashEntry(data), engine.config.encoding);
  context.logger.debug('Hashed record', {
    algorithm: engine.config.algorithm,
    bytes: encodeText(data, engine.config.encoding).length,
  });

  return {
    exitCode: EXIT_CODES.SUCCESS,
    output: context.config.json ? JSON.stringify({ ...engine.config, digest }) : digest,
  };
}

/**
 * Register the hash command
 */
export function registerHashCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('hash <data>')
    .description('Print the leaf digest of a record')
    .option('--algorithm <name>', 'Digest algorithm (e.g. sha256, sha3-256)')
    .option('--encoding <name>', 'Text encoding (utf-8, utf-16-le, latin-1, ascii)')
    .option('--no-security', 'Disable leaf/node domain separation')
    .action(async (data: string, options: HashCommandOptions) => {
      const context = getContext();
      await runCommand(context, 'hash', () => executeHash(data, options, context));
    });
}
