import { z } from 'zod';

/** Pantry names are the identity key: trimmed and lowercased. */
export const ingredientNameSchema = z.string().trim().toLowerCase().min(1).max(100);

export const unitSchema = z.string().trim().toLowerCase().min(1).max(30);

export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const ingredientResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  quantity: z.number().nonnegative(),
  unit: z.string(),
  expiration_date: isoDateSchema.nullable(),
  category: z.string(),
  cost_per_unit: z.number().nonnegative(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const createIngredientSchema = z.object({
  name: ingredientNameSchema,
  quantity: z.number().nonnegative(),
  unit: unitSchema,
  expiration_date: isoDateSchema.nullable().default(null),
  category: z.string().trim().min(1).max(50).default('other'),
  cost_per_unit: z.number().nonnegative().default(0),
});

export const updateIngredientSchema = z.object({
  name: ingredientNameSchema,
  quantity: z.number().nonnegative(),
  unit: unitSchema,
  expiration_date: isoDateSchema.nullable(),
  category: z.string().trim().min(1).max(50),
  cost_per_unit: z.number().nonnegative(),
}).partial();

export const useIngredientSchema = z.object({
  amount: z.number().positive(),
});

/** Absolute quantity; negative values are accepted and clamped to zero. */
export const setQuantitySchema = z.object({
  quantity: z.number().finite(),
});

export const expiringQuerySchema = z.object({
  days: z.coerce.number().int().nonnegative().optional(),
});

export type CreateIngredientInput = z.infer<typeof createIngredientSchema>;
export type UpdateIngredientInput = z.infer<typeof updateIngredientSchema>;
export type IngredientResponse = z.infer<typeof ingredientResponseSchema>;
export type UseIngredientInput = z.infer<typeof useIngredientSchema>;
export type SetQuantityInput = z.infer<typeof setQuantitySchema>;
