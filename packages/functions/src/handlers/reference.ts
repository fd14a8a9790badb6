import { type Request, type Response, type NextFunction } from 'express';
import { convertQuerySchema } from '../shared.js';
import { errorHandler, NotFoundError, UnprocessableError } from '../middleware/error-handler.js';
import { createBaseApp } from '../middleware/create-resource-router.js';
import { asyncHandler } from '../middleware/async-handler.js';
import {
  convertUnits,
  formatQuantity,
  getCompatibleUnits,
  getStandardUnitFor,
  getUnitDimension,
  normalizeUnit,
} from '../services/unit-converter.service.js';
import {
  getSubstitutions,
  listSubstitutableIngredients,
  normalizeIngredientName,
} from '../services/substitution.service.js';

// Static lookup tables only; no Firestore access.
const app = createBaseApp('reference');

// GET /reference/convert?quantity=&from=&to=
app.get('/convert', asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
  const { quantity, from, to } = convertQuerySchema.parse(req.query);
  const result = convertUnits(quantity, from, to);
  if (result === null) {
    throw new UnprocessableError('INCOMPATIBLE_UNITS', `Cannot convert ${from} to ${to}`, { from, to });
  }
  res.json({
    success: true,
    data: { quantity, from, to, result, formatted: formatQuantity(result, to) },
  });
}));

// GET /reference/units/:unit
app.get('/units/:unit', asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
  const unit = normalizeUnit(req.params['unit'] ?? '');
  const dimension = getUnitDimension(unit);
  if (dimension === null) {
    next(new NotFoundError('Unit', unit, 'name'));
    return;
  }
  res.json({
    success: true,
    data: {
      unit,
      dimension,
      standard_unit: getStandardUnitFor(unit),
      compatible_units: getCompatibleUnits(unit),
    },
  });
}));

// GET /reference/substitutions
app.get('/substitutions', asyncHandler(async (_req: Request, res: Response, _next: NextFunction) => {
  const table = listSubstitutableIngredients().map((ingredient) => ({
    ingredient,
    options: getSubstitutions(ingredient),
  }));
  res.json({ success: true, data: table });
}));

// GET /reference/substitutions/:name
app.get('/substitutions/:name', asyncHandler(async (req: Request, res: Response, _next: NextFunction) => {
  const ingredient = normalizeIngredientName(req.params['name'] ?? '');
  res.json({ success: true, data: { ingredient, options: getSubstitutions(ingredient) } });
}));

// Error handler must be last
app.use(errorHandler);

export const referenceApp = app;
