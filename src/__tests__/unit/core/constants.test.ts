import { describe, it, expect } from 'vitest';
import {
  SUPPORTED_ALGORITHMS,
  SUPPORTED_ENCODINGS,
  normalizeAlgorithm,
  normalizeEncoding,
} from '../../../core/constants.js';
import { MerkleAuditError, UnsupportedParameterError } from '../../../core/errors.js';

describe('Supported parameters', () => {
  it('maps caller spellings onto the closed sets', () => {
    expect(normalizeAlgorithm('SHA-256')).toBe('sha256');
    expect(normalizeAlgorithm('sha3-512')).toBe('sha3_512');
    expect(normalizeEncoding('UTF-8')).toBe('utf_8');
    expect(normalizeEncoding('latin-1')).toBe('latin_1');
  });

  it('accepts every listed name unchanged', () => {
    for (const algorithm of SUPPORTED_ALGORITHMS) {
      expect(normalizeAlgorithm(algorithm)).toBe(algorithm);
    }
    for (const encoding of SUPPORTED_ENCODINGS) {
      expect(normalizeEncoding(encoding)).toBe(encoding);
    }
  });

  it('never falls back to a default', () => {
    expect(() => normalizeAlgorithm('')).toThrow(UnsupportedParameterError);
    expect(() => normalizeAlgorithm('sha256 ')).toThrow(UnsupportedParameterError);
    expect(() => normalizeEncoding('utf8')).toThrow(UnsupportedParameterError);
  });

  it('raises errors from the package hierarchy', () => {
    try {
      normalizeEncoding('utf-32');
      expect.unreachable('utf-32 should be rejected');
    } catch (error) {
      expect(error).toBeInstanceOf(MerkleAuditError);
      expect(error).toBeInstanceOf(UnsupportedParameterError);
      expect(error).toMatchObject({ name: 'UnsupportedParameterError', parameter: 'encoding', value: 'utf-32' });
    }
  });
});
