import { type Request, type Response, type NextFunction } from 'express';
import { info } from 'firebase-functions/logger';
import { shoppingListRequestSchema, type Recipe, type ShoppingListRequestInput } from '../shared.js';
import { validate } from '../middleware/validate.js';
import { errorHandler, NotFoundError } from '../middleware/error-handler.js';
import { createBaseApp, lazyRepository } from '../middleware/create-resource-router.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { IngredientRepository } from '../repositories/ingredient.repository.js';
import { RecipeRepository } from '../repositories/recipe.repository.js';
import {
  formatShoppingList,
  generateShoppingList,
  summarizeShoppingList,
} from '../services/shopping-list.service.js';

const app = createBaseApp('shopping-list');

const getIngredientRepo = lazyRepository(IngredientRepository);
const getRecipeRepo = lazyRepository(RecipeRepository);

// POST /shopping-list
app.post('/', validate(shoppingListRequestSchema), asyncHandler(async (req: Request<Record<string, string>, unknown, ShoppingListRequestInput>, res: Response, next: NextFunction) => {
  // A recipe picked more than once has its multipliers added together.
  const multipliersById = new Map<string, number>();
  for (const selection of req.body.recipes) {
    const previous = multipliersById.get(selection.recipe_id) ?? 0;
    multipliersById.set(selection.recipe_id, previous + (selection.multiplier ?? 1));
  }

  const recipeIds = [...multipliersById.keys()];
  const found = await Promise.all(recipeIds.map((id) => getRecipeRepo().findById(id)));

  const recipes: Recipe[] = [];
  const multipliers = new Map<string, number>();
  for (const [index, recipe] of found.entries()) {
    const id = recipeIds[index] ?? '';
    if (recipe === null) {
      next(new NotFoundError('Recipe', id));
      return;
    }
    recipes.push(recipe);
    multipliers.set(recipe.name, multipliersById.get(id) ?? 1);
  }

  const pantry = await getIngredientRepo().findAll();
  const items = generateShoppingList(recipes, pantry, multipliers);

  info('shopping_list:generated', { recipe_count: recipes.length, item_count: items.length });
  res.json({
    success: true,
    data: {
      items,
      summary: summarizeShoppingList(items),
      text: formatShoppingList(items),
    },
  });
}));

// Error handler must be last
app.use(errorHandler);

export const shoppingListApp = app;
