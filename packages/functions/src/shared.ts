/**
 * Single import surface for domain types and request/response schemas.
 */
export * from './types/api.js';
export * from './types/errors.js';
export * from './types/ingredient.js';
export * from './types/recipe.js';
export * from './types/units.js';
export * from './types/substitution.js';
export * from './types/matching.js';
export * from './types/shopping-list.js';
export * from './types/stats.js';
export * from './schemas/index.js';
