import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../../../cli/lib/config.js';
import { InvalidConfigurationError } from '../../../core/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'merkle-audit-config-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', async () => {
    const config = await loadConfig({ cwd: dir });

    expect(config.hashing).toEqual(DEFAULT_CONFIG.hashing);
    expect(config.paths.receipts).toBeNull();
    expect(config.verbose).toBe(false);
    expect(config.json).toBe(false);
    expect(config.configPath).toBeNull();
  });

  it('finds a YAML config file in a parent directory', async () => {
    writeFileSync(
      join(dir, '.merkle-auditrc.yaml'),
      ['version: 1', 'hashing:', '  algorithm: sha3-256', '  security: false', 'paths:', '  receipts: ./receipts'].join('\n')
    );
    const nested = join(dir, 'nested', 'deeper');
    mkdirSync(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested });

    expect(config.configPath).toBe(join(dir, '.merkle-auditrc.yaml'));
    expect(config.hashing).toEqual({ algorithm: 'sha3-256', encoding: 'utf_8', rawBytes: true, security: false });
    expect(config.paths.receipts).toBe('./receipts');
  });

  it('reads an explicit JSON config file', async () => {
    const path = join(dir, 'audit.json');
    writeFileSync(path, JSON.stringify({ hashing: { encoding: 'latin_1', raw_bytes: false } }));

    const config = await loadConfig({ configPath: path });

    expect(config.hashing.encoding).toBe('latin_1');
    expect(config.hashing.rawBytes).toBe(false);
  });

  it('lets environment variables override the file and flags override both', async () => {
    writeFileSync(join(dir, '.merkle-auditrc'), 'hashing:\n  algorithm: md5\n');
    vi.stubEnv('MERKLE_AUDIT_ALGORITHM', 'sha512');
    vi.stubEnv('MERKLE_AUDIT_SECURITY', 'false');
    vi.stubEnv('MERKLE_AUDIT_JSON', '1');

    const fromEnv = await loadConfig({ cwd: dir });
    expect(fromEnv.hashing.algorithm).toBe('sha512');
    expect(fromEnv.hashing.security).toBe(false);
    expect(fromEnv.json).toBe(true);

    const fromFlags = await loadConfig({ cwd: dir, overrides: { algorithm: 'sha1', json: false } });
    expect(fromFlags.hashing.algorithm).toBe('sha1');
    expect(fromFlags.json).toBe(false);
  });

  it('treats an empty config file as no settings', async () => {
    writeFileSync(join(dir, '.merkle-auditrc.yml'), '');

    const config = await loadConfig({ cwd: dir });

    expect(config.hashing).toEqual(DEFAULT_CONFIG.hashing);
  });

  it('rejects settings of the wrong type', async () => {
    writeFileSync(join(dir, '.merkle-auditrc'), 'hashing:\n  security: maybe\n');

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(InvalidConfigurationError);
  });

  it('rejects a missing explicit config file', async () => {
    await expect(loadConfig({ configPath: join(dir, 'absent.yaml') })).rejects.toThrow('Config file not found');
  });
});
