/**
 * Proof types consumed by validation
 */

/**
 * Side on which a path entry joins its neighbour: +1 right, -1 left
 */
export type Sign = 1 | -1;

/**
 * One audit-path entry: the sign and a digest in engine output form
 */
export type SignedHash = readonly [sign: Sign, digest: Buffer];

/**
 * Proof header fields validation reads or writes
 */
export interface AuditProofHeader {
  readonly uuid: string;
  readonly provider: string;
  /** False when the tree failed to produce the proof */
  readonly generation: boolean;
  /** Outcome of the most recent validation; null until validated */
  status: boolean | null;
}

export interface AuditProofBody {
  readonly proofPath: readonly SignedHash[];
  readonly proofIndex: number;
}

/**
 * Any proof object the orchestrator can validate
 *
 * `getValidationParams()` returns the hashing regime the proof was generated
 * under. It is checked key by key, so it is typed loosely here.
 */
export interface AuditProof {
  readonly header: AuditProofHeader;
  readonly body: AuditProofBody;
  getValidationParams(): Readonly<Record<string, unknown>>;
}
