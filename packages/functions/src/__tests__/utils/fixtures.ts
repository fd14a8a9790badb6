/**
 * Test data fixtures and factory functions.
 *
 * These functions create properly typed test data with sensible defaults
 * that can be overridden for specific test scenarios.
 */

import type { Ingredient, PantryStock, Recipe, RecipeData, RecipeIngredient } from '../../shared.js';

// ============ Counter for unique IDs ============

let idCounter = 0;

function generateId(prefix: string = 'test'): string {
  idCounter++;
  return `${prefix}-${idCounter}`;
}

/**
 * Reset the ID counter between test runs.
 * Call this in beforeEach to ensure deterministic IDs.
 */
export function resetIdCounter(): void {
  idCounter = 0;
}

const FIXED_TIMESTAMP = '2024-01-01T00:00:00.000Z';

function createTimestamps(): { created_at: string; updated_at: string } {
  return { created_at: FIXED_TIMESTAMP, updated_at: FIXED_TIMESTAMP };
}

// ============ Pantry Fixtures ============

export function createIngredient(overrides?: Partial<Ingredient>): Ingredient {
  return {
    id: generateId('ingredient'),
    name: 'flour',
    quantity: 2,
    unit: 'cups',
    expiration_date: null,
    category: 'other',
    cost_per_unit: 0,
    ...createTimestamps(),
    ...overrides,
  };
}

export function stock(name: string, quantity: number, unit: string): PantryStock {
  return { name, quantity, unit };
}

// ============ Recipe Fixtures ============

export function createRecipeIngredient(overrides?: Partial<RecipeIngredient>): RecipeIngredient {
  return {
    name: 'flour',
    quantity: 1,
    unit: 'cups',
    optional: false,
    ...overrides,
  };
}

export function line(name: string, quantity: number, unit: string, optional = false): RecipeIngredient {
  return { name, quantity, unit, optional };
}

export function createRecipeData(overrides?: Partial<RecipeData>): RecipeData {
  return {
    name: 'Pancakes',
    servings: 4,
    ingredients: [createRecipeIngredient()],
    instructions: ['Mix everything', 'Cook on a hot griddle'],
    prep_time: 10,
    cook_time: 15,
    difficulty: 'easy',
    cuisine: 'american',
    dietary_tags: [],
    rating: 0,
    times_made: 0,
    ...overrides,
  };
}

export function createRecipe(overrides?: Partial<Recipe>): Recipe {
  return {
    id: generateId('recipe'),
    ...createRecipeData(),
    ...createTimestamps(),
    ...overrides,
  };
}
