/**
 * Merkle Audit Constants
 *
 * Closed enumerations of the digest algorithms and text encodings a hash
 * engine may be configured with, and the normalization that maps caller
 * spellings (`SHA-256`, `utf-8`) onto them.
 */

import { UnsupportedParameterError } from './errors.js';

// ============================================================================
// Supported Parameters
// ============================================================================

/**
 * Digest algorithms, keyed by their normalized name
 */
export const SUPPORTED_ALGORITHMS = [
  'md5',
  'sha1',
  'sha224',
  'sha256',
  'sha384',
  'sha512',
  'sha3_224',
  'sha3_256',
  'sha3_384',
  'sha3_512',
] as const;

export type HashAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

/**
 * Text encodings, keyed by their normalized name
 */
export const SUPPORTED_ENCODINGS = ['utf_8', 'utf_16_le', 'latin_1', 'ascii'] as const;

export type TextEncoding = (typeof SUPPORTED_ENCODINGS)[number];

/**
 * node:crypto names for each algorithm
 */
export const NODE_HASH_NAMES: Readonly<Record<HashAlgorithm, string>> = {
  md5: 'md5',
  sha1: 'sha1',
  sha224: 'sha224',
  sha256: 'sha256',
  sha384: 'sha384',
  sha512: 'sha512',
  sha3_224: 'sha3-224',
  sha3_256: 'sha3-256',
  sha3_384: 'sha3-384',
  sha3_512: 'sha3-512',
};

/**
 * Buffer encodings for each text encoding
 */
export const BUFFER_ENCODINGS: Readonly<Record<TextEncoding, BufferEncoding>> = {
  utf_8: 'utf8',
  utf_16_le: 'utf16le',
  latin_1: 'latin1',
  ascii: 'ascii',
};

// ============================================================================
// Hashing Defaults
// ============================================================================

export const DEFAULT_ALGORITHM: HashAlgorithm = 'sha256';
export const DEFAULT_ENCODING: TextEncoding = 'utf_8';

/** Bytes fed to the digest per update call */
export const DIGEST_CHUNK_SIZE = 1024;

/** Domain-separation marker for leaf input */
export const LEAF_PREFIX = '\x00';

/** Domain-separation marker for each internal-node operand */
export const NODE_PREFIX = '\x01';

// ============================================================================
// Normalization
// ============================================================================

function normalizeName(provided: string): string {
  return provided.toLowerCase().replace(/-/g, '_');
}

function isSupportedAlgorithm(name: string): name is HashAlgorithm {
  return (SUPPORTED_ALGORITHMS as readonly string[]).includes(name);
}

function isSupportedEncoding(name: string): name is TextEncoding {
  return (SUPPORTED_ENCODINGS as readonly string[]).includes(name);
}

/**
 * Map a caller-supplied algorithm name onto the supported set
 *
 * @throws UnsupportedParameterError if no supported algorithm matches
 */
export function normalizeAlgorithm(provided: string): HashAlgorithm {
  const normalized = normalizeName(provided);
  if (!isSupportedAlgorithm(normalized)) {
    throw new UnsupportedParameterError('algorithm', provided);
  }
  return normalized;
}

/**
 * Map a caller-supplied encoding name onto the supported set
 *
 * @throws UnsupportedParameterError if no supported encoding matches
 */
export function normalizeEncoding(provided: string): TextEncoding {
  const normalized = normalizeName(provided);
  if (!isSupportedEncoding(normalized)) {
    throw new UnsupportedParameterError('encoding', provided);
  }
  return normalized;
}
