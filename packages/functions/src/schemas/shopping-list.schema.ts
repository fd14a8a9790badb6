import { z } from 'zod';

export const shoppingListSelectionSchema = z.object({
  recipe_id: z.string().min(1),
  multiplier: z.number().positive().optional(),
}).strict();

export const shoppingListRequestSchema = z.object({
  recipes: z.array(shoppingListSelectionSchema).min(1),
});

export type ShoppingListSelectionInput = z.infer<typeof shoppingListSelectionSchema>;
export type ShoppingListRequestInput = z.infer<typeof shoppingListRequestSchema>;
