import { z } from 'zod';

export type Ingredient = z.infer<
  typeof import('../schemas/ingredient.schema.js').ingredientResponseSchema
>;
export type CreateIngredientDTO = z.infer<
  typeof import('../schemas/ingredient.schema.js').createIngredientSchema
>;
export type UpdateIngredientDTO = z.infer<
  typeof import('../schemas/ingredient.schema.js').updateIngredientSchema
>;

/** The pantry fields that matching and shopping-list aggregation read. */
export type PantryStock = Pick<Ingredient, 'name' | 'quantity' | 'unit'>;

export interface ExpiringIngredient extends Ingredient {
  days_until_expiry: number;
}
