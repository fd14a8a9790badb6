import type { Application } from 'express';
import { onRequest, type HttpsFunction, type HttpsOptions } from 'firebase-functions/v2/https';
import { initializeFirebase } from './firebase.js';

// Initialize Firebase at cold start
initializeFirebase();

// Import handler apps
import { healthApp } from './handlers/health.js';
import { ingredientsApp } from './handlers/ingredients.js';
import { recipesApp } from './handlers/recipes.js';
import { matchesApp } from './handlers/matches.js';
import { shoppingListApp } from './handlers/shopping-list.js';
import { referenceApp } from './handlers/reference.js';

// Common options
const defaultOptions: HttpsOptions = {
  region: 'us-central1',
  cors: true,
  invoker: 'public',
};

/** Register an HTTPS function from an Express app. */
function register(
  app: Application,
  options: HttpsOptions = defaultOptions
): HttpsFunction {
  return onRequest(options, app);
}

// ============ Function Registration ============
export const health = register(healthApp);
export const ingredients = register(ingredientsApp);
export const recipes = register(recipesApp);
export const matches = register(matchesApp);
export const shoppingList = register(shoppingListApp);
export const reference = register(referenceApp);
