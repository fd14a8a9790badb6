import { type Request, type Response, type NextFunction } from 'express';
import {
  matchQuerySchema,
  matchByTimeQuerySchema,
  matchByDifficultyQuerySchema,
  canMakeQuerySchema,
  type Ingredient,
  type Recipe,
} from '../shared.js';
import { errorHandler, NotFoundError } from '../middleware/error-handler.js';
import { createBaseApp, lazyRepository } from '../middleware/create-resource-router.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { IngredientRepository } from '../repositories/ingredient.repository.js';
import { RecipeRepository } from '../repositories/recipe.repository.js';
import {
  canMakeRecipe,
  findMatchingRecipes,
  rankByAvailability,
  suggestRecipesByDifficulty,
  suggestRecipesByTime,
} from '../services/recipe-ranking.service.js';

const app = createBaseApp('matches');

const getIngredientRepo = lazyRepository(IngredientRepository);
const getRecipeRepo = lazyRepository(RecipeRepository);

interface KitchenSnapshot {
  pantry: Ingredient[];
  recipes: Recipe[];
}

async function loadSnapshot(): Promise<KitchenSnapshot> {
  const [pantry, recipes] = await Promise.all([
    getIngredientRepo().findAll(),
    getRecipeRepo().findAll(),
  ]);
  return { pantry, recipes };
}

// GET /matches?min_score=&allow_substitutions=
app.get('/', asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
  const query = matchQuerySchema.parse(req.query);
  const { pantry, recipes } = await loadSnapshot();
  const matches = findMatchingRecipes(pantry, recipes, {
    minScore: query.min_score,
    allowSubstitutions: query.allow_substitutions,
  });
  res.json({ success: true, data: matches });
}));

// GET /matches/quick
app.get('/quick', asyncHandler(async (_req: Request, res: Response, _next: NextFunction) => {
  const { pantry, recipes } = await loadSnapshot();
  res.json({ success: true, data: rankByAvailability(pantry, recipes) });
}));

// GET /matches/by-time?max_time=&min_score=
app.get('/by-time', asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
  const query = matchByTimeQuerySchema.parse(req.query);
  const { pantry, recipes } = await loadSnapshot();
  res.json({
    success: true,
    data: suggestRecipesByTime(pantry, recipes, query.max_time, query.min_score),
  });
}));

// GET /matches/by-difficulty?difficulty=&min_score=
app.get('/by-difficulty', asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
  const query = matchByDifficultyQuerySchema.parse(req.query);
  const { pantry, recipes } = await loadSnapshot();
  res.json({
    success: true,
    data: suggestRecipesByDifficulty(pantry, recipes, query.difficulty, query.min_score),
  });
}));

// GET /matches/can-make/:recipeId?allow_substitutions=
app.get('/can-make/:recipeId', asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
  const recipeId = req.params['recipeId'] ?? '';
  const query = canMakeQuerySchema.parse(req.query);
  const recipe = await getRecipeRepo().findById(recipeId);
  if (recipe === null) {
    next(new NotFoundError('Recipe', recipeId));
    return;
  }
  const pantry = await getIngredientRepo().findAll();
  res.json({
    success: true,
    data: {
      recipe_id: recipe.id,
      ...canMakeRecipe(recipe, pantry, query.allow_substitutions ?? true),
    },
  });
}));

// Error handler must be last
app.use(errorHandler);

export const matchesApp = app;
