/**
 * Validation Orchestrator
 *
 * High-level entry points: validate a proof to a boolean, or to a receipt
 * that is optionally stored as `<storageDir>/<uuid>.json`.
 *
 * An invalid proof is an outcome, not an error: InvalidProofError is turned
 * into `false` here. Configuration errors and I/O errors propagate.
 *
 * SIDE EFFECT: `proof.header.status` is set to every outcome. Validating the
 * same proof object from concurrent callers must be serialized by the caller.
 */

import { join } from 'node:path';
import { InvalidProofError } from '../core/errors.js';
import { atomicWriteFileSync } from '../core/utils/atomic-write.js';
import { createLogger, type LoggerLike } from '../core/utils/logger.js';
import type { AuditProof } from '../proof/types.js';
import { ProofValidator } from './proof-validator.js';
import { Receipt } from './receipt.js';

export interface ValidationOrchestratorOptions {
  readonly logger?: LoggerLike;
  /** Source of the validation moment stamped on receipts */
  readonly clock?: () => Date;
}

export class ValidationOrchestrator {
  private readonly logger: LoggerLike;
  private readonly clock: () => Date;

  constructor(options: ValidationOrchestratorOptions = {}) {
    this.logger = options.logger ?? createLogger({ module: 'validation' });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Validate `proof` against `target` and record the outcome on the proof
   *
   * @param target - Claimed root hash, in engine output form
   * @returns true if the audit path folds to `target`
   * @throws MissingConfigurationKeyError, InvalidConfigurationError or
   *   UnsupportedParameterError if the proof declares an unusable regime
   */
  validate(target: Uint8Array, proof: AuditProof): boolean {
    const validator = ProofValidator.fromMapping(proof.getValidationParams());

    let result: boolean;
    try {
      validator.run(target, proof);
      result = true;
    } catch (error) {
      if (!(error instanceof InvalidProofError)) {
        throw error;
      }
      this.logger.debug('Proof rejected', { proofUuid: proof.header.uuid, reason: error.reason });
      result = false;
    }

    proof.header.status = result;
    this.logger.debug('Proof validated', {
      proofUuid: proof.header.uuid,
      provider: proof.header.provider,
      result,
    });

    return result;
  }

  /**
   * Validate and return a receipt of the outcome
   *
   * @param storageDir - If given, the receipt is also written to
   *   `<storageDir>/<receipt uuid>.json`; otherwise no I/O happens
   * @throws Error from the file system if the receipt cannot be written
   */
  validateWithReceipt(target: Uint8Array, proof: AuditProof, storageDir?: string): Receipt {
    const result = this.validate(target, proof);

    const receipt = Receipt.create(
      {
        proofUuid: proof.header.uuid,
        proofProvider: proof.header.provider,
        result,
      },
      this.clock()
    );

    if (storageDir) {
      const filePath = join(storageDir, `${receipt.uuid}.json`);
      atomicWriteFileSync(filePath, receipt.toJsonText());
      this.logger.info('Receipt stored', { receiptUuid: receipt.uuid, path: filePath });
    }

    return receipt;
  }
}

let defaultOrchestrator: ValidationOrchestrator | null = null;

function getDefaultOrchestrator(): ValidationOrchestrator {
  if (!defaultOrchestrator) {
    defaultOrchestrator = new ValidationOrchestrator();
  }
  return defaultOrchestrator;
}

/**
 * Validate `proof` against `target` with the default orchestrator
 */
export function validateProof(target: Uint8Array, proof: AuditProof): boolean {
  return getDefaultOrchestrator().validate(target, proof);
}

/**
 * Validate and produce a receipt with the default orchestrator
 */
export function validationReceipt(
  target: Uint8Array,
  proof: AuditProof,
  storageDir?: string
): Receipt {
  return getDefaultOrchestrator().validateWithReceipt(target, proof, storageDir);
}
