/**
 * Merkle Audit Error Types
 *
 * Custom error classes for hashing configuration, proof validation and
 * receipt replication failures.
 *
 * Only InvalidProofError is an expected outcome: the orchestration layer turns
 * it into a `false` result. Everything else is fatal for the call that raised
 * it and propagates to the caller.
 */

/**
 * Base class for every error raised by this package
 */
export class MerkleAuditError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MerkleAuditError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * A hash engine was requested with an algorithm or encoding outside the
 * supported sets
 */
export class UnsupportedParameterError extends MerkleAuditError {
  constructor(
    public readonly parameter: 'algorithm' | 'encoding',
    public readonly value: string
  ) {
    super(`${value} is not a supported ${parameter}`);
    this.name = 'UnsupportedParameterError';
  }
}

/**
 * A validation-parameter mapping lacks one of its required keys
 */
export class MissingConfigurationKeyError extends MerkleAuditError {
  constructor(public readonly key: string) {
    super(`Hash engine could not be configured: missing parameter: ${key}`);
    this.name = 'MissingConfigurationKeyError';
  }
}

/**
 * Configuration values are present but of the wrong shape
 */
export class InvalidConfigurationError extends MerkleAuditError {
  constructor(
    message: string,
    public readonly issues: readonly string[]
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Data cannot be represented in the engine's configured encoding
 */
export class UndecodableRecordError extends MerkleAuditError {
  constructor(public readonly encoding: string) {
    super(`Record cannot be represented in ${encoding}`);
    this.name = 'UndecodableRecordError';
  }
}

/**
 * The audit path does not lead to the target hash, or could not be folded
 */
export class InvalidProofError extends MerkleAuditError {
  constructor(public readonly reason: string) {
    super(`Invalid Merkle proof: ${reason}`);
    this.name = 'InvalidProofError';
  }
}

/**
 * A serialized receipt could not be replicated
 */
export class ReceiptFormatError extends MerkleAuditError {
  constructor(public readonly issues: readonly string[]) {
    super(`Malformed receipt: ${issues.join('; ')}`);
    this.name = 'ReceiptFormatError';
  }
}

/**
 * A serialized proof could not be loaded
 */
export class ProofFormatError extends MerkleAuditError {
  constructor(public readonly issues: readonly string[]) {
    super(`Malformed proof: ${issues.join('; ')}`);
    this.name = 'ProofFormatError';
  }
}
