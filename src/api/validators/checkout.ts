import { z } from 'zod';

export const idempotencyTokenSchema = z.string().trim().min(1).max(255);

export const checkoutBodySchema = z
  .object({
    idempotencyToken: idempotencyTokenSchema.optional(),
  })
  .passthrough();
