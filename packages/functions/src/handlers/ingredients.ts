import { type Request, type Response, type NextFunction } from 'express';
import { info } from 'firebase-functions/logger';
import {
  createIngredientSchema,
  updateIngredientSchema,
  expiringQuerySchema,
  useIngredientSchema,
  setQuantitySchema,
  type UseIngredientInput,
  type SetQuantityInput,
} from '../shared.js';
import { validate } from '../middleware/validate.js';
import { NotFoundError, UnprocessableError } from '../middleware/error-handler.js';
import { createResourceRouter } from '../middleware/create-resource-router.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { IngredientRepository } from '../repositories/ingredient.repository.js';
import { getExpiringIngredients, useQuantity } from '../services/pantry.service.js';
import { getConfig } from '../config.js';

export const ingredientsApp = createResourceRouter({
  resourceName: 'ingredients',
  displayName: 'Ingredient',
  RepoClass: IngredientRepository,
  createSchema: createIngredientSchema,
  updateSchema: updateIngredientSchema,
  registerCustomRoutes: ({ app, getRepo }) => {
    // GET /ingredients/expiring?days=
    app.get('/expiring', asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
      const { days } = expiringQuerySchema.parse(req.query);
      const window = days ?? getConfig().expiringSoonDays;
      const expiring = getExpiringIngredients(await getRepo().findAll(), window);
      res.json({ success: true, data: expiring });
    }));

    // GET /ingredients/by-name/:name
    app.get('/by-name/:name', asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
      const name = req.params['name'] ?? '';
      const ingredient = await getRepo().findByName(name);
      if (ingredient === null) {
        next(new NotFoundError('Ingredient', name, 'name'));
        return;
      }
      res.json({ success: true, data: ingredient });
    }));

    // DELETE /ingredients/by-name/:name
    app.delete('/by-name/:name', asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
      const name = req.params['name'] ?? '';
      const deleted = await getRepo().deleteByName(name);
      if (!deleted) {
        next(new NotFoundError('Ingredient', name, 'name'));
        return;
      }
      res.json({ success: true, data: { deleted: true } });
    }));

    // POST /ingredients/:id/use
    app.post('/:id/use', validate(useIngredientSchema), asyncHandler(async (req: Request<Record<string, string>, unknown, UseIngredientInput>, res: Response, next: NextFunction) => {
      const id = req.params['id'] ?? '';
      const ingredient = await getRepo().findById(id);
      if (ingredient === null) {
        next(new NotFoundError('Ingredient', id));
        return;
      }

      const result = useQuantity(ingredient, req.body.amount);
      if (!result.ok) {
        throw new UnprocessableError(
          'INSUFFICIENT_QUANTITY',
          `Only ${ingredient.quantity} ${ingredient.unit} of ${ingredient.name} available`,
          { available: ingredient.quantity, requested: req.body.amount }
        );
      }

      const updated = await getRepo().setQuantity(id, result.item.quantity);
      if (updated === null) {
        next(new NotFoundError('Ingredient', id));
        return;
      }
      info('ingredients:used', { id, amount: req.body.amount, remaining: updated.quantity });
      res.json({ success: true, data: updated });
    }));

    // POST /ingredients/:id/quantity
    app.post('/:id/quantity', validate(setQuantitySchema), asyncHandler(async (req: Request<Record<string, string>, unknown, SetQuantityInput>, res: Response, next: NextFunction) => {
      const id = req.params['id'] ?? '';
      const updated = await getRepo().setQuantity(id, req.body.quantity);
      if (updated === null) {
        next(new NotFoundError('Ingredient', id));
        return;
      }
      res.json({ success: true, data: updated });
    }));
  },
});
