import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import {
  createIngredient,
  createMockIngredientRepository,
  createMockRecipeRepository,
  createRecipe,
  line,
} from '../__tests__/utils/index.js';

// Mock firebase before importing the handler
vi.mock('../firebase.js', () => ({
  getFirestoreDb: vi.fn(),
}));

const mockRecipeRepo = createMockRecipeRepository();
const mockIngredientRepo = createMockIngredientRepository();

vi.mock('../repositories/recipe.repository.js', () => ({
  RecipeRepository: vi.fn().mockImplementation(() => mockRecipeRepo),
}));

vi.mock('../repositories/ingredient.repository.js', () => ({
  IngredientRepository: vi.fn().mockImplementation(() => mockIngredientRepo),
}));

// Import after mocks
import { shoppingListApp } from './shopping-list.js';

const pancakes = createRecipe({
  id: 'pancakes',
  name: 'Pancakes',
  ingredients: [
    line('flour', 2, 'cups'),
    line('milk', 1, 'cup'),
    line('eggs', 2, 'pieces'),
    line('blueberries', 1, 'cup', true),
  ],
});

describe('Shopping List Handler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockRecipeRepo.findById.mockImplementation((id: string) =>
      Promise.resolve(id === 'pancakes' ? pancakes : null)
    );
    mockIngredientRepo.findAll.mockResolvedValue([
      createIngredient({ name: 'flour', quantity: 1, unit: 'cups' }),
      createIngredient({ name: 'milk', quantity: 2, unit: 'cups' }),
    ]);
  });

  it('should list shortfalls with a summary and checklist text', async () => {
    const response = await request(shoppingListApp)
      .post('/')
      .send({ recipes: [{ recipe_id: 'pancakes' }] });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      data: {
        items: [
          { name: 'flour', quantity: 1, unit: 'cups', category: 'grains' },
          { name: 'eggs', quantity: 2, unit: 'pieces', category: 'other' },
        ],
        summary: { total_items: 2, by_category: { grains: 1, other: 1 } },
        text: [
          '🛒 SHOPPING LIST',
          '='.repeat(50),
          '',
          '🌾 Grains & Bread:',
          '  ☐ 1 cups flour',
          '',
          '📦 Other:',
          '  ☐ 2 pieces eggs',
        ].join('\n'),
      },
    });
  });

  it('should scale requirements by the serving multiplier', async () => {
    const response = await request(shoppingListApp)
      .post('/')
      .send({ recipes: [{ recipe_id: 'pancakes', multiplier: 2 }] });

    expect(response.body.data.items).toEqual([
      { name: 'flour', quantity: 3, unit: 'cups', category: 'grains' },
      { name: 'eggs', quantity: 4, unit: 'pieces', category: 'other' },
    ]);
  });

  it('should add up multipliers for a recipe picked twice', async () => {
    const response = await request(shoppingListApp)
      .post('/')
      .send({ recipes: [{ recipe_id: 'pancakes' }, { recipe_id: 'pancakes', multiplier: 1 }] });

    expect(mockRecipeRepo.findById).toHaveBeenCalledTimes(1);
    expect(response.body.data.items).toEqual([
      { name: 'flour', quantity: 3, unit: 'cups', category: 'grains' },
      { name: 'eggs', quantity: 4, unit: 'pieces', category: 'other' },
    ]);
  });

  it('should report an empty list when the pantry covers everything', async () => {
    mockIngredientRepo.findAll.mockResolvedValue([
      createIngredient({ name: 'flour', quantity: 1, unit: 'l' }),
      createIngredient({ name: 'milk', quantity: 1, unit: 'cup' }),
      createIngredient({ name: 'eggs', quantity: 6, unit: 'pieces' }),
    ]);

    const response = await request(shoppingListApp)
      .post('/')
      .send({ recipes: [{ recipe_id: 'pancakes' }] });

    expect(response.body).toEqual({
      success: true,
      data: {
        items: [],
        summary: { total_items: 0, by_category: {} },
        text: '✅ You have all ingredients needed!',
      },
    });
  });

  it('should return 404 when a selected recipe does not exist', async () => {
    const response = await request(shoppingListApp)
      .post('/')
      .send({ recipes: [{ recipe_id: 'pancakes' }, { recipe_id: 'missing' }] });

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Recipe with id missing not found' },
    });
    expect(mockIngredientRepo.findAll).not.toHaveBeenCalled();
  });

  it('should require at least one recipe', async () => {
    const response = await request(shoppingListApp).post('/').send({ recipes: [] });

    expect(response.status).toBe(400);
    expect(response.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('should reject a non-positive multiplier', async () => {
    const response = await request(shoppingListApp)
      .post('/')
      .send({ recipes: [{ recipe_id: 'pancakes', multiplier: 0 }] });

    expect(response.status).toBe(400);
  });
});
