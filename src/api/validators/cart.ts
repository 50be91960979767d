import { z } from 'zod';

export const addCartLineSchema = z.object({
  productId: z.string().trim().min(1, 'productId is required'),
  quantity: z.number().int().min(1, 'quantity must be >= 1'),
});

export const setCartQuantitySchema = z.object({
  // 0 removes the line
  quantity: z.number().int().min(0, 'quantity must be >= 0'),
});

export const productIdParamsSchema = z.object({
  productId: z.string().trim().min(1),
});
