/**
 * Validate Command
 *
 * Validate a stored Merkle proof against a claimed root hash and print the
 * validation receipt.
 *
 * Usage:
 *   merkle-audit validate <proof-file> --target <digest> [--receipts-dir <dir>]
 *
 * Exit codes: 0 valid, 1 not valid, 2 error.
 */

import type { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { normalizeEncoding } from '../../core/constants.js';
import { encodeText } from '../../hashing/encoding.js';
import { Proof } from '../../proof/proof.js';
import { ValidationOrchestrator } from '../../validation/orchestrator.js';
import { EXIT_CODES, runCommand, type CommandContext, type CommandResult } from '../lib/context.js';

export interface ValidateCommandOptions {
  /** Claimed root hash as hex text */
  readonly target: string;
  /** Overrides the configured receipts directory */
  readonly receiptsDir?: string;
}

/**
 * Execute the validate command
 */
export async function executeValidate(
  proofFile: string,
  options: ValidateCommandOptions,
  context: CommandContext
): Promise<CommandResult> {
  const proof = Proof.fromJson(await readFile(proofFile, 'utf-8'));
  // Digests are lowercase hex
  const target = encodeText(options.target.trim().toLowerCase(), normalizeEncoding(proof.header.encoding));
  const storageDir = options.receiptsDir ?? context.config.paths.receipts ?? undefined;

  const receipt = new ValidationOrchestrator({ logger: context.logger }).validateWithReceipt(target, proof, storageDir);

  context.logger.info(receipt.result ? 'Proof is valid' : 'Proof is NOT valid', {
    proofUuid: proof.header.uuid,
    receiptUuid: receipt.uuid,
    stored: storageDir !== undefined,
  });

  return {
    exitCode: receipt.result ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_PROOF,
    output: context.config.json ? receipt.toJsonText() : receipt.toString(),
  };
}

/**
 * Register the validate command
 */
export function registerValidateCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('validate <proof-file>')
    .description('Validate a Merkle proof against a claimed root hash')
    .requiredOption('--target <digest>', 'Claimed root hash (hex)')
    .option('--receipts-dir <dir>', 'Store the receipt as <dir>/<uuid>.json')
    .action(async (proofFile: string, options: ValidateCommandOptions) => {
      const context = getContext();
      await runCommand(context, 'validate', () => executeValidate(proofFile, options, context));
    });
}
