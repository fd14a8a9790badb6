/**
 * Mock repository factories for unit testing.
 *
 * These factories create typed mocks for all repository methods,
 * allowing tests to control repository behavior without hitting the database.
 *
 * Usage:
 * ```typescript
 * const repo = createMockRecipeRepository();
 * repo.findById.mockResolvedValue(createRecipe());
 * ```
 */

import { vi, type Mock } from 'vitest';

// ============ Base Repository Mock Interface ============

export interface MockBaseRepository {
  create: Mock;
  findById: Mock;
  findAll: Mock;
  update: Mock;
  delete: Mock;
}

export interface MockNamedRepository extends MockBaseRepository {
  findByName: Mock;
  deleteByName: Mock;
}

// ============ Ingredient Repository Mock ============

export interface MockIngredientRepository extends MockNamedRepository {
  setQuantity: Mock;
}

export function createMockIngredientRepository(): MockIngredientRepository {
  return {
    create: vi.fn(),
    findById: vi.fn(),
    findAll: vi.fn(),
    update: vi.fn(),
    delete: vi.fn(),
    findByName: vi.fn(),
    deleteByName: vi.fn(),
    setQuantity: vi.fn(),
  };
}

// ============ Recipe Repository Mock ============

export interface MockRecipeRepository extends MockNamedRepository {
  incrementTimesMade: Mock;
}

export function createMockRecipeRepository(): MockRecipeRepository {
  return {
    create: vi.fn(),
    findById: vi.fn(),
    findAll: vi.fn(),
    update: vi.fn(),
    delete: vi.fn(),
    findByName: vi.fn(),
    deleteByName: vi.fn(),
    incrementTimesMade: vi.fn(),
  };
}
