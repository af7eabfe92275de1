/**
 * Hash Engine
 *
 * Domain-separated digests for Merkle leaves and internal nodes.
 *
 * Structure of the hashed input with security enabled:
 * - leaf:  0x00 || data
 * - node:  0x01 || left || 0x01 || right
 *
 * The prefix is applied to each node operand, not once to the whole buffer,
 * so a node input is never byte-identical to a leaf input of the same
 * length. Prefixes are encoded with the configured encoding (two bytes each
 * under utf_16_le).
 *
 * Digests are returned as the lowercase hex text of the raw digest, encoded
 * with the configured encoding. Proof paths carry digests in this same form.
 *
 * USAGE:
 * ```typescript
 * const engine = new HashEngine({ algorithm: 'sha256', encoding: 'utf_8' });
 * const parent = engine.hashPair(engine.hashEntry('a'), engine.hashEntry('b'));
 * ```
 */

import { createHash } from 'node:crypto';
import {
  DEFAULT_ALGORITHM,
  DEFAULT_ENCODING,
  DIGEST_CHUNK_SIZE,
  LEAF_PREFIX,
  NODE_HASH_NAMES,
  NODE_PREFIX,
  normalizeAlgorithm,
  normalizeEncoding,
  type HashAlgorithm,
  type TextEncoding,
} from '../core/constants.js';
import { decodeBytes, encodeText } from './encoding.js';

/**
 * Validated engine configuration
 */
export interface HashingConfig {
  readonly algorithm: HashAlgorithm;
  readonly encoding: TextEncoding;
  /** Hash byte input as-is instead of requiring it to decode under `encoding` */
  readonly rawBytes: boolean;
  /** Prefix leaf and node input with distinct markers */
  readonly security: boolean;
}

/**
 * Engine options as supplied by callers, before normalization
 */
export interface HashEngineOptions {
  readonly algorithm?: string;
  readonly encoding?: string;
  readonly rawBytes?: boolean;
  readonly security?: boolean;
}

export class HashEngine {
  readonly config: HashingConfig;
  private readonly leafPrefix: Buffer;
  private readonly nodePrefix: Buffer;

  /**
   * @throws UnsupportedParameterError for an algorithm or encoding outside
   *   the supported sets
   */
  constructor(options: HashEngineOptions = {}) {
    const algorithm = normalizeAlgorithm(options.algorithm ?? DEFAULT_ALGORITHM);
    const encoding = normalizeEncoding(options.encoding ?? DEFAULT_ENCODING);

    this.config = Object.freeze({
      algorithm,
      encoding,
      rawBytes: options.rawBytes ?? true,
      security: options.security ?? true,
    });

    this.leafPrefix = this.config.security ? encodeText(LEAF_PREFIX, encoding) : Buffer.alloc(0);
    this.nodePrefix = this.config.security ? encodeText(NODE_PREFIX, encoding) : Buffer.alloc(0);
  }

  /**
   * Digest `buffer`, feeding it to the algorithm in fixed-size chunks
   */
  consume(buffer: Uint8Array): Buffer {
    const hasher = createHash(NODE_HASH_NAMES[this.config.algorithm]);

    for (let offset = 0; offset < buffer.length; offset += DIGEST_CHUNK_SIZE) {
      hasher.update(buffer.subarray(offset, offset + DIGEST_CHUNK_SIZE));
    }

    return encodeText(hasher.digest('hex'), this.config.encoding);
  }

  /**
   * Leaf digest of a record
   *
   * Text is encoded with the configured encoding. Bytes are hashed as given
   * when `rawBytes` is set; otherwise they must decode under the encoding.
   *
   * @throws UndecodableRecordError
   */
  hashEntry(data: Uint8Array | string): Buffer {
    const record = typeof data === 'string' ? encodeText(data, this.config.encoding) : this.normalizeBytes(data);
    return this.consume(Buffer.concat([this.leafPrefix, record]));
  }

  /**
   * Internal-node digest of two child digests, `left` first
   */
  hashPair(left: Uint8Array, right: Uint8Array): Buffer {
    return this.consume(Buffer.concat([this.nodePrefix, left, this.nodePrefix, right]));
  }

  private normalizeBytes(data: Uint8Array): Buffer {
    if (this.config.rawBytes) {
      return Buffer.from(data);
    }
    return encodeText(decodeBytes(data, this.config.encoding), this.config.encoding);
  }
}
