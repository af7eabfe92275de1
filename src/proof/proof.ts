/**
 * Merkle Proof Model
 *
 * In-process form of a proof emitted by a Merkle tree. Validation only reads
 * it, apart from `header.status`, which records the last validation outcome.
 *
 * In memory, path digests are the bytes a HashEngine produces (hex text
 * encoded with the declared encoding). On the wire they are the hex text.
 */

import { normalizeEncoding } from '../core/constants.js';
import { ProofFormatError } from '../core/errors.js';
import { toSortedJson } from '../core/utils/sorted-json.js';
import { decodeBytes, encodeText } from '../hashing/encoding.js';
import { formatIssues } from '../schemas/issues.js';
import { SerializedProofSchema, type SerializedProof } from '../schemas/proof.js';
import type { ValidationParams } from '../schemas/validation-params.js';
import type { AuditProof, AuditProofBody, AuditProofHeader, SignedHash } from './types.js';

export interface ProofHeader extends AuditProofHeader {
  readonly timestamp: number;
  readonly creationMoment: string;
  readonly algorithm: string;
  readonly encoding: string;
  readonly rawBytes: boolean;
  readonly security: boolean;
}

export type ProofBody = AuditProofBody;

export class Proof implements AuditProof {
  readonly header: ProofHeader;
  readonly body: ProofBody;

  constructor(header: ProofHeader, body: ProofBody) {
    this.header = { ...header };
    this.body = {
      proofIndex: body.proofIndex,
      proofPath: body.proofPath.map(([sign, digest]): SignedHash => [sign, Buffer.from(digest)]),
    };
  }

  /**
   * Load a proof from its serialized mapping
   *
   * @throws ProofFormatError if the mapping does not match the wire format
   * @throws UnsupportedParameterError if the declared encoding is unsupported
   */
  static fromDict(value: unknown): Proof {
    const parsed = SerializedProofSchema.safeParse(value);
    if (!parsed.success) {
      throw new ProofFormatError(formatIssues(parsed.error));
    }

    const { header, body } = parsed.data;
    const encoding = normalizeEncoding(header.encoding);

    return new Proof(
      {
        uuid: header.uuid,
        timestamp: header.timestamp,
        creationMoment: header.creation_moment,
        generation: header.generation,
        provider: header.provider,
        algorithm: header.algorithm,
        encoding: header.encoding,
        rawBytes: header.raw_bytes,
        security: header.security,
        status: header.status,
      },
      {
        proofIndex: body.proof_index,
        proofPath: body.proof_path.map(([sign, digest]): SignedHash => [sign, encodeText(digest, encoding)]),
      }
    );
  }

  /**
   * Load a proof from JSON text
   *
   * @throws ProofFormatError if the text is not JSON or not a proof
   */
  static fromJson(text: string): Proof {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new ProofFormatError([error instanceof Error ? error.message : String(error)]);
    }
    return Proof.fromDict(value);
  }

  /**
   * Hashing regime declared by the proof's generator
   */
  getValidationParams(): ValidationParams {
    return {
      algorithm: this.header.algorithm,
      encoding: this.header.encoding,
      rawBytes: this.header.rawBytes,
      security: this.header.security,
    };
  }

  serialize(): SerializedProof {
    const encoding = normalizeEncoding(this.header.encoding);

    return {
      header: {
        uuid: this.header.uuid,
        timestamp: this.header.timestamp,
        creation_moment: this.header.creationMoment,
        generation: this.header.generation,
        provider: this.header.provider,
        algorithm: this.header.algorithm,
        encoding: this.header.encoding,
        raw_bytes: this.header.rawBytes,
        security: this.header.security,
        status: this.header.status,
      },
      body: {
        proof_index: this.body.proofIndex,
        proof_path: this.body.proofPath.map(([sign, digest]): [1 | -1, string] => [
          sign,
          decodeBytes(digest, encoding),
        ]),
      },
    };
  }

  /**
   * Sorted-key, 4-space-indented JSON
   */
  toJsonText(): string {
    return toSortedJson(this.serialize());
  }
}
