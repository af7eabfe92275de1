/**
 * Hashing parameters a proof declares for its own validation
 */

import { z } from 'zod';

export const ValidationParamsSchema = z.object({
  algorithm: z.string(),
  encoding: z.string(),
  rawBytes: z.boolean(),
  security: z.boolean(),
});

export type ValidationParams = Readonly<z.infer<typeof ValidationParamsSchema>>;

export const REQUIRED_VALIDATION_KEYS = ['algorithm', 'encoding', 'rawBytes', 'security'] as const;
