/**
 * Merkle proof wire format
 *
 * Path digests travel as their hex text; `sign` is +1 when the entry joins
 * its right neighbour next and -1 when it joins its left neighbour.
 */

import { z } from 'zod';

export const SignSchema = z.union([z.literal(1), z.literal(-1)]);

export const SerializedSignedHashSchema = z.tuple([SignSchema, z.string()]);

export const ProofHeaderSchema = z.object({
  uuid: z.string(),
  timestamp: z.number().int(),
  creation_moment: z.string(),
  generation: z.boolean(),
  provider: z.string(),
  algorithm: z.string(),
  encoding: z.string(),
  raw_bytes: z.boolean(),
  security: z.boolean(),
  status: z.boolean().nullable(),
});

export const ProofBodySchema = z.object({
  proof_index: z.number().int(),
  proof_path: z.array(SerializedSignedHashSchema),
});

export const SerializedProofSchema = z.object({
  header: ProofHeaderSchema,
  body: ProofBodySchema,
});

export type SerializedProofHeader = z.infer<typeof ProofHeaderSchema>;
export type SerializedProofBody = z.infer<typeof ProofBodySchema>;
export type SerializedProof = z.infer<typeof SerializedProofSchema>;
