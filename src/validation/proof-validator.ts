/**
 * Proof Validator
 *
 * Checks an audit path against a target root hash using the hashing regime
 * the proof itself declares, not the verifier's defaults. A fresh validator
 * (and engine) is built per proof since proofs may declare different regimes.
 */

import {
  InvalidConfigurationError,
  InvalidProofError,
  MissingConfigurationKeyError,
} from '../core/errors.js';
import { HashEngine, type HashingConfig } from '../hashing/hash-engine.js';
import type { AuditProof } from '../proof/types.js';
import { formatIssues } from '../schemas/issues.js';
import {
  REQUIRED_VALIDATION_KEYS,
  ValidationParamsSchema,
  type ValidationParams,
} from '../schemas/validation-params.js';
import { foldPath } from './path-fold.js';

export class ProofValidator {
  private readonly engine: HashEngine;

  /**
   * @throws UnsupportedParameterError for an unsupported algorithm or encoding
   */
  constructor(params: ValidationParams) {
    this.engine = new HashEngine(params);
  }

  /**
   * Build a validator from an untyped parameter mapping, such as the one a
   * proof reports through `getValidationParams()`
   *
   * @throws MissingConfigurationKeyError naming the first absent key
   * @throws InvalidConfigurationError if a value has the wrong type
   * @throws UnsupportedParameterError for an unsupported algorithm or encoding
   */
  static fromMapping(mapping: Readonly<Record<string, unknown>>): ProofValidator {
    for (const key of REQUIRED_VALIDATION_KEYS) {
      if (mapping[key] === undefined) {
        throw new MissingConfigurationKeyError(key);
      }
    }

    const parsed = ValidationParamsSchema.safeParse(mapping);
    if (!parsed.success) {
      throw new InvalidConfigurationError(
        'Hash engine could not be configured',
        formatIssues(parsed.error)
      );
    }

    return new ProofValidator(parsed.data);
  }

  get config(): HashingConfig {
    return this.engine.config;
  }

  /**
   * Validate `proof` against `target`
   *
   * @param target - Claimed root hash, in engine output form
   * @throws InvalidProofError if the proof was never generated or its path
   *   does not fold to `target`
   */
  run(target: Uint8Array, proof: Pick<AuditProof, 'header' | 'body'>): void {
    if (!proof.header.generation) {
      throw new InvalidProofError('proof generation had failed');
    }

    const candidate = foldPath(this.engine, proof.body.proofPath, proof.body.proofIndex);

    if (!candidate.equals(target)) {
      throw new InvalidProofError('audit path does not lead to the target hash');
    }
  }
}
