/**
 * Validation receipt wire format
 *
 * Field names are the on-disk names: receipt files written by older
 * verifiers must replicate unchanged. Unknown keys are rejected rather than
 * dropped, since a replicated receipt must equal its source.
 */

import { z } from 'zod';

export const ReceiptHeaderSchema = z
  .object({
    uuid: z.string().min(1, 'uuid must not be empty'),
    timestamp: z.number().int('timestamp must be whole seconds'),
    validation_moment: z.string(),
  })
  .strict();

export const ReceiptBodySchema = z
  .object({
    proof_uuid: z.string(),
    proof_provider: z.string(),
    result: z.boolean(),
  })
  .strict();

export const SerializedReceiptSchema = z
  .object({
    header: ReceiptHeaderSchema,
    body: ReceiptBodySchema,
  })
  .strict();

export type ReceiptHeader = z.infer<typeof ReceiptHeaderSchema>;
export type ReceiptBody = z.infer<typeof ReceiptBodySchema>;
export type SerializedReceipt = z.infer<typeof SerializedReceiptSchema>;
