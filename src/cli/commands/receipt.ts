/**
 * Receipt Commands
 *
 * Usage:
 *   merkle-audit receipt show <receipt-file>
 */

import type { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { Receipt } from '../../validation/receipt.js';
import { EXIT_CODES, runCommand, type CommandContext, type CommandResult } from '../lib/context.js';

/**
 * Replicate a stored receipt and render it
 */
export async function executeReceiptShow(
  receiptFile: string,
  context: CommandContext
): Promise<CommandResult> {
  const receipt = Receipt.fromJson(await readFile(receiptFile, 'utf-8'));

  return {
    exitCode: EXIT_CODES.SUCCESS,
    output: context.config.json ? receipt.toJsonText() : receipt.toString(),
  };
}

/**
 * Register all receipt subcommands
 */
export function registerReceiptCommands(program: Command, getContext: () => CommandContext): void {
  const receipt = program.command('receipt').description('Inspect stored validation receipts');

  receipt
    .command('show <receipt-file>')
    .description('Print a stored receipt')
    .action(async (receiptFile: string) => {
      const context = getContext();
      await runCommand(context, 'receipt show', () => executeReceiptShow(receiptFile, context));
    });
}
