import { z } from 'zod';

export type Recipe = z.infer<
  typeof import('../schemas/recipe.schema.js').recipeResponseSchema
>;
export type CreateRecipeDTO = z.infer<
  typeof import('../schemas/recipe.schema.js').createRecipeSchema
>;
export type UpdateRecipeDTO = z.infer<
  typeof import('../schemas/recipe.schema.js').updateRecipeSchema
>;
export type RecipeIngredient = z.infer<
  typeof import('../schemas/recipe.schema.js').recipeIngredientSchema
>;
export type Difficulty = z.infer<
  typeof import('../schemas/recipe.schema.js').difficultySchema
>;

/** A recipe as a value, without storage identity (e.g. a scaled variant). */
export type RecipeData = CreateRecipeDTO;
