import type { Firestore } from 'firebase-admin/firestore';
import type { Recipe, CreateRecipeDTO, UpdateRecipeDTO, RecipeIngredient } from '../shared.js';
import { ConflictError } from '../types/errors.js';
import type { INamedRepository } from '../types/repository.js';
import { BaseRepository } from './base.repository.js';
import {
  isRecord,
  readBoolean,
  readEnum,
  readNumber,
  readString,
  readStringArray,
} from './firestore-type-guards.js';

const DIFFICULTIES = ['easy', 'medium', 'hard'] as const;

/** Case-insensitive lookup key, stored alongside the display name. */
export function recipeNameKey(name: string): string {
  return name.trim().toLowerCase();
}

export class RecipeRepository
  extends BaseRepository<Recipe, CreateRecipeDTO, UpdateRecipeDTO & Record<string, unknown>>
  implements INamedRepository<Recipe>
{
  constructor(db?: Firestore) {
    super('recipes', db);
  }

  async findAll(): Promise<Recipe[]> {
    const snapshot = await this.collection.orderBy('created_at').get();
    return this.docsToEntities(snapshot.docs);
  }

  async create(data: CreateRecipeDTO): Promise<Recipe> {
    const existing = await this.findByName(data.name);
    if (existing !== null) {
      throw new ConflictError(`Recipe "${existing.name}" already exists`);
    }

    const recipeData = {
      name: data.name,
      servings: data.servings,
      ingredients: data.ingredients,
      instructions: data.instructions,
      prep_time: data.prep_time,
      cook_time: data.cook_time,
      difficulty: data.difficulty,
      cuisine: data.cuisine,
      dietary_tags: data.dietary_tags,
      rating: data.rating,
      times_made: data.times_made,
      ...this.createTimestamps(),
    };

    const docRef = await this.collection.add({ ...recipeData, name_key: recipeNameKey(data.name) });
    return {
      id: docRef.id,
      ...recipeData,
    };
  }

  async findByName(name: string): Promise<Recipe | null> {
    return this.findOneWhere('name_key', recipeNameKey(name));
  }

  async deleteByName(name: string): Promise<boolean> {
    const existing = await this.findByName(name);
    if (existing === null) {
      return false;
    }
    await this.collection.doc(existing.id).delete();
    return true;
  }

  override async update(id: string, data: UpdateRecipeDTO & Record<string, unknown>): Promise<Recipe | null> {
    if (data.name !== undefined) {
      const other = await this.findByName(data.name);
      if (other !== null && other.id !== id) {
        throw new ConflictError(`Recipe "${other.name}" already exists`);
      }
    }
    return super.update(id, data);
  }

  /** Records one more cook of the recipe. */
  async incrementTimesMade(id: string): Promise<Recipe | null> {
    const existing = await this.findById(id);
    if (existing === null) {
      return null;
    }
    return this.update(id, { times_made: existing.times_made + 1 });
  }

  protected override buildUpdatePayload(data: UpdateRecipeDTO & Record<string, unknown>): Record<string, unknown> {
    const updates = super.buildUpdatePayload(data);
    if (data.name !== undefined) {
      updates['name_key'] = recipeNameKey(data.name);
    }
    return updates;
  }

  protected parseRecipeIngredient(ingredientData: unknown): RecipeIngredient | null {
    if (!isRecord(ingredientData)) {
      return null;
    }

    const name = readString(ingredientData, 'name');
    const quantity = readNumber(ingredientData, 'quantity');
    const unit = readString(ingredientData, 'unit');

    if (name === null || quantity === null || unit === null) {
      return null;
    }

    return {
      name,
      quantity,
      unit,
      optional: readBoolean(ingredientData, 'optional') ?? false,
    };
  }

  protected parseEntity(id: string, data: Record<string, unknown>): Recipe | null {
    const name = readString(data, 'name');
    const servings = readNumber(data, 'servings');
    const instructions = readStringArray(data, 'instructions');
    const createdAt = readString(data, 'created_at');
    const updatedAt = readString(data, 'updated_at');

    if (
      name === null ||
      servings === null ||
      instructions === null ||
      createdAt === null ||
      updatedAt === null
    ) {
      return null;
    }

    const ingredientsRaw = data['ingredients'];
    if (!Array.isArray(ingredientsRaw)) {
      return null;
    }

    const ingredients: RecipeIngredient[] = [];
    for (const ingredient of ingredientsRaw) {
      const parsedIngredient = this.parseRecipeIngredient(ingredient);
      if (parsedIngredient === null) {
        return null;
      }
      ingredients.push(parsedIngredient);
    }

    return {
      id,
      name,
      servings,
      ingredients,
      instructions,
      prep_time: readNumber(data, 'prep_time') ?? 0,
      cook_time: readNumber(data, 'cook_time') ?? 0,
      difficulty: readEnum(data, 'difficulty', DIFFICULTIES) ?? 'medium',
      cuisine: readString(data, 'cuisine') ?? 'other',
      dietary_tags: readStringArray(data, 'dietary_tags') ?? [],
      rating: readNumber(data, 'rating') ?? 0,
      times_made: readNumber(data, 'times_made') ?? 0,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }
}
