/**
 * Validation Receipt
 *
 * Immutable record of one validation event. A fresh receipt mints its uuid
 * (time-based) and timestamp exactly once; replicating a receipt from its
 * serialization keeps both, so a receipt's identity survives transport.
 *
 * USAGE:
 * ```typescript
 * const receipt = Receipt.create({ proofUuid, proofProvider, result: true });
 * const copy = Receipt.fromJson(receipt.toJsonText());
 * copy.uuid === receipt.uuid; // true
 * ```
 */

import { v1 as uuidv1 } from 'uuid';
import { ReceiptFormatError } from '../core/errors.js';
import { formatCtime } from '../core/utils/ctime.js';
import { toSortedJson } from '../core/utils/sorted-json.js';
import { formatIssues } from '../schemas/issues.js';
import {
  SerializedReceiptSchema,
  type ReceiptBody,
  type ReceiptHeader,
  type SerializedReceipt,
} from '../schemas/receipt.js';

/**
 * What a fresh receipt records about the validated proof
 */
export interface ReceiptFields {
  readonly proofUuid: string;
  /** Id of the tree that provided the proof */
  readonly proofProvider: string;
  readonly result: boolean;
}

const RECEIPT_RULE_WIDTH = 78;

function rule(title: string): string {
  const label = ` ${title} `;
  const left = Math.floor((RECEIPT_RULE_WIDTH - label.length) / 2);
  return '-'.repeat(left) + label + '-'.repeat(RECEIPT_RULE_WIDTH - label.length - left);
}

export class Receipt {
  readonly header: Readonly<ReceiptHeader>;
  readonly body: Readonly<ReceiptBody>;

  private constructor(header: ReceiptHeader, body: ReceiptBody) {
    this.header = Object.freeze({ ...header });
    this.body = Object.freeze({ ...body });
  }

  /**
   * Record a new validation event
   *
   * @param now - Validation moment (default: current time)
   */
  static create(fields: ReceiptFields, now: Date = new Date()): Receipt {
    return new Receipt(
      {
        uuid: uuidv1(),
        timestamp: Math.floor(now.getTime() / 1000),
        validation_moment: formatCtime(now),
      },
      {
        proof_uuid: fields.proofUuid,
        proof_provider: fields.proofProvider,
        result: fields.result,
      }
    );
  }

  /**
   * Replicate a receipt from its serialized mapping
   *
   * @throws ReceiptFormatError if the mapping is not a receipt
   */
  static fromDict(value: unknown): Receipt {
    const parsed = SerializedReceiptSchema.safeParse(value);
    if (!parsed.success) {
      throw new ReceiptFormatError(formatIssues(parsed.error));
    }
    return new Receipt(parsed.data.header, parsed.data.body);
  }

  /**
   * Replicate a receipt from JSON text
   *
   * @throws ReceiptFormatError if the text is not JSON or not a receipt
   */
  static fromJson(text: string): Receipt {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new ReceiptFormatError([error instanceof Error ? error.message : String(error)]);
    }
    return Receipt.fromDict(value);
  }

  get uuid(): string {
    return this.header.uuid;
  }

  get timestamp(): number {
    return this.header.timestamp;
  }

  get result(): boolean {
    return this.body.result;
  }

  /**
   * Same identity and same recorded outcome
   */
  equals(other: Receipt): boolean {
    return (
      this.header.uuid === other.header.uuid &&
      this.header.timestamp === other.header.timestamp &&
      this.header.validation_moment === other.header.validation_moment &&
      this.body.proof_uuid === other.body.proof_uuid &&
      this.body.proof_provider === other.body.proof_provider &&
      this.body.result === other.body.result
    );
  }

  serialize(): SerializedReceipt {
    return {
      header: { ...this.header },
      body: { ...this.body },
    };
  }

  /**
   * Sorted-key, 4-space-indented JSON; the receipt file format
   */
  toJsonText(): string {
    return toSortedJson(this.serialize());
  }

  toString(): string {
    return [
      '',
      rule('VALIDATION RECEIPT'),
      '',
      `uuid           : ${this.header.uuid}`,
      '',
      `timestamp      : ${this.header.timestamp} (${this.header.validation_moment})`,
      '',
      `proof-uuid     : ${this.body.proof_uuid}`,
      `proof-provider : ${this.body.proof_provider}`,
      '',
      `result         : ${this.body.result ? 'VALID' : 'NON VALID'}`,
      '',
      rule('END OF RECEIPT'),
      '',
    ]
      .map((line) => (line.length > 0 ? `    ${line}` : line))
      .join('\n');
  }
}
