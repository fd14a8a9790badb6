export * from './ingredient.schema.js';
export * from './recipe.schema.js';
export * from './matching.schema.js';
export * from './shopping-list.schema.js';
export * from './reference.schema.js';
