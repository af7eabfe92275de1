#!/usr/bin/env node
/**
 * merkle-audit CLI Entry Point
 *
 * Validates Merkle proofs against claimed root hashes, stores validation
 * receipts, and inspects stored receipts.
 *
 * @module merkle-audit-cli
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { registerCommands } from '../src/cli/commands/index.js';
import { loadConfig } from '../src/cli/lib/config.js';
import { EXIT_CODES, type CommandContext } from '../src/cli/lib/context.js';
import { createCLILogger } from '../src/cli/lib/logger.js';

// ============================================================================
// Global State
// ============================================================================

let globalContext: CommandContext | null = null;

function getGlobalContext(): CommandContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));

  // bin/ when run from source, dist/bin/ when built
  for (const candidate of [join(here, '..', 'package.json'), join(here, '..', '..', 'package.json')]) {
    if (!existsSync(candidate)) continue;
    const packageJson: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  }
  return '0.0.0';
}

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
}

async function initializeContext(options: GlobalOptions): Promise<CommandContext> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger };
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('merkle-audit')
    .description('Validate Merkle audit paths and keep replicable validation receipts')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .merkle-auditrc)')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program, getGlobalContext);

  return program;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
