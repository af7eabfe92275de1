/**
 * CLI Command Tests
 *
 * Commands are exercised through their execute functions, which return the
 * output and exit code instead of printing.
 */

import { createHash } from 'node:crypto';
import { mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { executeHash, executeReceiptShow, executeValidate } from '../../../cli/commands/index.js';
import { DEFAULT_CONFIG, type CLIConfig } from '../../../cli/lib/config.js';
import { EXIT_CODES, type CommandContext } from '../../../cli/lib/context.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import { Receipt } from '../../../validation/receipt.js';
import { ReceiptFormatError } from '../../../core/errors.js';
import { buildTree, inclusionProof } from '../../utils/audit-paths.js';

function context(overrides: Partial<CLIConfig> = {}): CommandContext {
  return {
    config: { ...DEFAULT_CONFIG, verbose: false, json: false, configPath: null, ...overrides },
    logger: createCLILogger({ level: 'error' }),
  };
}

describe('CLI commands', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'merkle-audit-cli-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('hash', () => {
    it('prints the leaf digest under the configured regime', async () => {
      const result = await executeHash('a', {}, context());
      const expected = createHash('sha256').update(Buffer.from([0x00])).update('a').digest('hex');

      expect(result).toEqual({ exitCode: EXIT_CODES.SUCCESS, output: expected });
    });

    it('drops domain separation with --no-security', async () => {
      const result = await executeHash('a', { security: false }, context());

      expect(result.output).toBe('ca978112ca1bbdcafac231b39a23dc4da786eff8147c4e72b9807785afee48bb');
    });

    it('reports the regime alongside the digest as JSON', async () => {
      const result = await executeHash('a', { algorithm: 'SHA-1', security: false }, context({ json: true }));

      expect(JSON.parse(result.output)).toEqual({
        algorithm: 'sha1',
        encoding: 'utf_8',
        rawBytes: true,
        security: false,
        digest: '86f7e437faa5a7fce15d1ddcb9eaeaea377667b8',
      });
    });

    it('logs the encoded size of the record', async () => {
      const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const debugContext: CommandContext = {
        ...context(),
        logger: createCLILogger({ level: 'debug', json: true }),
      };

      await executeHash('héllo', {}, debugContext);

      const entries = stderr.mock.calls.map(([line]): unknown => JSON.parse(String(line)));
      expect(entries).toContainEqual(
        expect.objectContaining({ message: 'Hashed record', algorithm: 'sha256', bytes: 6 })
      );
    });
  });

  describe('validate', () => {
    const tree = buildTree(['w', 'x', 'y', 'z']);
    let proofFile: string;

    beforeEach(() => {
      proofFile = join(dir, 'proof.json');
      writeFileSync(proofFile, inclusionProof(tree, 3).toJsonText());
    });

    it('exits 0 and prints a VALID receipt for the announced root', async () => {
      const result = await executeValidate(proofFile, { target: tree.root.toString() }, context());

      expect(result.exitCode).toBe(EXIT_CODES.SUCCESS);
      expect(result.output.split('\n')).toContain('    result         : VALID');
    });

    it('accepts the root in upper-case hex', async () => {
      const result = await executeValidate(proofFile, { target: tree.root.toString().toUpperCase() }, context());

      expect(result.exitCode).toBe(EXIT_CODES.SUCCESS);
    });

    it('exits 1 for a root the path does not lead to', async () => {
      const result = await executeValidate(proofFile, { target: tree.levels[1][0].toString() }, context());

      expect(result.exitCode).toBe(EXIT_CODES.INVALID_PROOF);
      expect(result.output.split('\n')).toContain('    result         : NON VALID');
    });

    it('prints the receipt JSON and stores it in the receipts directory', async () => {
      const receipts = join(dir, 'receipts');
      mkdirSync(receipts);

      const result = await executeValidate(
        proofFile,
        { target: `${tree.root.toString()}\n`, receiptsDir: receipts },
        context({ json: true })
      );
      const receipt = Receipt.fromJson(result.output);

      expect(receipt.result).toBe(true);
      expect(receipt.body.proof_uuid).toBe('proof-0001');
      expect(readdirSync(receipts)).toEqual([`${receipt.uuid}.json`]);
    });

    it('uses the configured receipts directory', async () => {
      const receipts = join(dir, 'configured');
      mkdirSync(receipts);

      await executeValidate(proofFile, { target: tree.root.toString() }, context({ paths: { receipts } }));

      expect(readdirSync(receipts)).toHaveLength(1);
    });
  });

  describe('receipt show', () => {
    it('replicates a stored receipt', async () => {
      const receipt = Receipt.create({ proofUuid: 'proof-0007', proofProvider: 'tree-0002', result: false });
      const file = join(dir, `${receipt.uuid}.json`);
      writeFileSync(file, receipt.toJsonText());

      const human = await executeReceiptShow(file, context());
      const json = await executeReceiptShow(file, context({ json: true }));

      expect(human.output).toBe(receipt.toString());
      expect(json.output).toBe(receipt.toJsonText());
    });

    it('rejects a file that is not a receipt', async () => {
      const file = join(dir, 'broken.json');
      writeFileSync(file, '{"header": {}}');

      await expect(executeReceiptShow(file, context())).rejects.toThrow(ReceiptFormatError);
    });
  });
});
