/**
 * CLI command registration
 */

import type { Command } from 'commander';
import type { CommandContext } from '../lib/context.js';
import { registerHashCommand } from './hash.js';
import { registerReceiptCommands } from './receipt.js';
import { registerValidateCommand } from './validate.js';

export { executeHash } from './hash.js';
export { executeValidate } from './validate.js';
export { executeReceiptShow } from './receipt.js';

export function registerCommands(program: Command, getContext: () => CommandContext): void {
  registerHashCommand(program, getContext);
  registerValidateCommand(program, getContext);
  registerReceiptCommands(program, getContext);
}
