import { z } from 'zod';
import { ingredientNameSchema, unitSchema } from './ingredient.schema.js';

export const difficultySchema = z.enum(['easy', 'medium', 'hard']);

export const recipeIngredientSchema = z.object({
  name: ingredientNameSchema,
  quantity: z.number().positive(),
  unit: unitSchema,
  optional: z.boolean().default(false),
}).strict();

const recipeFields = {
  name: z.string().trim().min(1).max(200),
  servings: z.number().int().positive(),
  ingredients: z.array(recipeIngredientSchema).min(1),
  instructions: z.array(z.string().trim().min(1)).min(1),
  prep_time: z.number().int().nonnegative(),
  cook_time: z.number().int().nonnegative(),
  difficulty: difficultySchema,
  cuisine: z.string().trim().min(1).max(50),
  dietary_tags: z.array(z.string().trim().toLowerCase().min(1)),
  rating: z.number().min(0).max(5),
  times_made: z.number().int().nonnegative(),
};

export const createRecipeSchema = z.object({
  ...recipeFields,
  prep_time: recipeFields.prep_time.default(0),
  cook_time: recipeFields.cook_time.default(0),
  difficulty: recipeFields.difficulty.default('medium'),
  cuisine: recipeFields.cuisine.default('other'),
  dietary_tags: recipeFields.dietary_tags.default([]),
  rating: recipeFields.rating.default(0),
  times_made: recipeFields.times_made.default(0),
});

export const updateRecipeSchema = z.object(recipeFields).partial();

export const recipeResponseSchema = z.object({
  id: z.string(),
  ...recipeFields,
  created_at: z.string(),
  updated_at: z.string(),
}).strict();

export const scaleRecipeSchema = z.object({
  servings: z.number().int().positive(),
  save: z.boolean().default(false),
});

export type CreateRecipeInput = z.infer<typeof createRecipeSchema>;
export type UpdateRecipeInput = z.infer<typeof updateRecipeSchema>;
export type RecipeIngredientInput = z.infer<typeof recipeIngredientSchema>;
export type RecipeResponse = z.infer<typeof recipeResponseSchema>;
export type ScaleRecipeInput = z.infer<typeof scaleRecipeSchema>;
