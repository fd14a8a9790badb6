import type { RecipeData } from '../shared.js';
import { normalizeIngredientName } from './substitution.service.js';

const SPICES_AND_SEASONINGS: ReadonlySet<string> = new Set([
  'salt',
  'pepper',
  'garlic powder',
  'onion powder',
  'paprika',
  'cumin',
  'oregano',
  'basil',
  'thyme',
  'rosemary',
  'sage',
  'cayenne',
  'chili powder',
  'black pepper',
  'vanilla extract',
]);

const LEAVENING_AGENTS: ReadonlySet<string> = new Set([
  'baking powder',
  'baking soda',
  'yeast',
  'cream of tartar',
]);

// Share of each extra multiple that spices keep when scaling up.
const SPICE_GROWTH_RATE = 0.8;
// Leavening scales linearly up to this factor, then at LEAVENING_GROWTH_RATE.
const LEAVENING_LINEAR_LIMIT = 2;
const LEAVENING_GROWTH_RATE = 0.5;

/**
 * New quantity for one ingredient line. Spices grow more slowly than the
 * recipe when scaling up, leavening agents slow down past double, and
 * everything else scales linearly. Scaling down is always linear.
 */
export function scaleIngredientQuantity(
  ingredientName: string,
  quantity: number,
  factor: number
): number {
  const name = normalizeIngredientName(ingredientName);

  if (SPICES_AND_SEASONINGS.has(name)) {
    return factor > 1 ? quantity * (1 + (factor - 1) * SPICE_GROWTH_RATE) : quantity * factor;
  }

  if (LEAVENING_AGENTS.has(name)) {
    if (factor <= LEAVENING_LINEAR_LIMIT) {
      return quantity * factor;
    }
    return quantity * (LEAVENING_LINEAR_LIMIT + (factor - LEAVENING_LINEAR_LIMIT) * LEAVENING_GROWTH_RATE);
  }

  return quantity * factor;
}

/**
 * Builds a variant of `recipe` for `newServings`. The source recipe is left
 * untouched; the variant starts with no rating and no times-made history.
 */
export function scaleRecipe(recipe: RecipeData, newServings: number): RecipeData {
  const factor = newServings / recipe.servings;

  return {
    name: `${recipe.name} (scaled for ${newServings})`,
    servings: newServings,
    ingredients: recipe.ingredients.map((ingredient) => ({
      name: ingredient.name,
      quantity: scaleIngredientQuantity(ingredient.name, ingredient.quantity, factor),
      unit: ingredient.unit,
      optional: ingredient.optional,
    })),
    instructions: [...recipe.instructions],
    prep_time: recipe.prep_time,
    cook_time: recipe.cook_time,
    difficulty: recipe.difficulty,
    cuisine: recipe.cuisine,
    dietary_tags: [...recipe.dietary_tags],
    rating: 0,
    times_made: 0,
  };
}
