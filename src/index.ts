/**
 * merkle-audit
 *
 * Verifies Merkle audit paths against announced root hashes and records each
 * outcome as a replicable validation receipt.
 *
 * @packageDocumentation
 */

// Hashing
export { HashEngine } from './hashing/hash-engine.js';
export type { HashingConfig, HashEngineOptions } from './hashing/hash-engine.js';
export {
  SUPPORTED_ALGORITHMS,
  SUPPORTED_ENCODINGS,
  normalizeAlgorithm,
  normalizeEncoding,
} from './core/constants.js';
export type { HashAlgorithm, TextEncoding } from './core/constants.js';

// Proofs
export { Proof } from './proof/proof.js';
export type { ProofHeader, ProofBody } from './proof/proof.js';
export type { AuditProof, AuditProofHeader, AuditProofBody, Sign, SignedHash } from './proof/types.js';

// Validation
export { foldPath } from './validation/path-fold.js';
export { ProofValidator } from './validation/proof-validator.js';
export {
  ValidationOrchestrator,
  validateProof,
  validationReceipt,
} from './validation/orchestrator.js';
export type { ValidationOrchestratorOptions } from './validation/orchestrator.js';
export { Receipt } from './validation/receipt.js';
export type { ReceiptFields } from './validation/receipt.js';

// Wire formats
export type {
  SerializedProof,
  SerializedReceipt,
  ReceiptHeader,
  ReceiptBody,
  ValidationParams,
} from './schemas/index.js';

// Errors
export {
  MerkleAuditError,
  UnsupportedParameterError,
  MissingConfigurationKeyError,
  InvalidConfigurationError,
  UndecodableRecordError,
  InvalidProofError,
  ReceiptFormatError,
  ProofFormatError,
} from './core/errors.js';

// Logging
export { logger, createLogger, Logger } from './core/utils/logger.js';
export type { LogLevel, LogMetadata, LoggerLike } from './core/utils/logger.js';
