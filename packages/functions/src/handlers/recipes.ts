import { type Request, type Response, type NextFunction } from 'express';
import { info } from 'firebase-functions/logger';
import {
  createRecipeSchema,
  updateRecipeSchema,
  scaleRecipeSchema,
  type ScaleRecipeInput,
} from '../shared.js';
import { validate } from '../middleware/validate.js';
import { NotFoundError } from '../middleware/error-handler.js';
import { createResourceRouter, lazyRepository } from '../middleware/create-resource-router.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { IngredientRepository } from '../repositories/ingredient.repository.js';
import { RecipeRepository } from '../repositories/recipe.repository.js';
import { computeKitchenStats } from '../services/pantry.service.js';
import { scaleRecipe } from '../services/recipe-scaling.service.js';

const getIngredientRepo = lazyRepository(IngredientRepository);

export const recipesApp = createResourceRouter({
  resourceName: 'recipes',
  displayName: 'Recipe',
  RepoClass: RecipeRepository,
  createSchema: createRecipeSchema,
  updateSchema: updateRecipeSchema,
  registerCustomRoutes: ({ app, getRepo }) => {
    // GET /recipes/stats
    app.get('/stats', asyncHandler(async (_req: Request, res: Response, _next: NextFunction) => {
      const [ingredients, recipes] = await Promise.all([
        getIngredientRepo().findAll(),
        getRepo().findAll(),
      ]);
      res.json({ success: true, data: computeKitchenStats(ingredients, recipes) });
    }));

    // GET /recipes/by-name/:name
    app.get('/by-name/:name', asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
      const name = req.params['name'] ?? '';
      const recipe = await getRepo().findByName(name);
      if (recipe === null) {
        next(new NotFoundError('Recipe', name, 'name'));
        return;
      }
      res.json({ success: true, data: recipe });
    }));

    // DELETE /recipes/by-name/:name
    app.delete('/by-name/:name', asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
      const name = req.params['name'] ?? '';
      const deleted = await getRepo().deleteByName(name);
      if (!deleted) {
        next(new NotFoundError('Recipe', name, 'name'));
        return;
      }
      res.json({ success: true, data: { deleted: true } });
    }));

    // POST /recipes/:id/scale
    app.post('/:id/scale', validate(scaleRecipeSchema), asyncHandler(async (req: Request<Record<string, string>, unknown, ScaleRecipeInput>, res: Response, next: NextFunction) => {
      const id = req.params['id'] ?? '';
      const recipe = await getRepo().findById(id);
      if (recipe === null) {
        next(new NotFoundError('Recipe', id));
        return;
      }

      const scaled = scaleRecipe(recipe, req.body.servings);
      if (!req.body.save) {
        res.json({ success: true, data: scaled });
        return;
      }

      const saved = await getRepo().create(scaled);
      info('recipes:scaled_copy_saved', { source_id: id, id: saved.id, servings: saved.servings });
      res.status(201).json({ success: true, data: saved });
    }));

    // POST /recipes/:id/cooked
    app.post('/:id/cooked', asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
      const id = req.params['id'] ?? '';
      const recipe = await getRepo().incrementTimesMade(id);
      if (recipe === null) {
        next(new NotFoundError('Recipe', id));
        return;
      }
      res.json({ success: true, data: recipe });
    }));
  },
});
