import type { Firestore } from 'firebase-admin/firestore';
import type { Ingredient, CreateIngredientDTO, UpdateIngredientDTO } from '../shared.js';
import { ConflictError } from '../types/errors.js';
import type { INamedRepository } from '../types/repository.js';
import { clampQuantity } from '../services/pantry.service.js';
import { normalizeIngredientName } from '../services/substitution.service.js';
import { BaseRepository } from './base.repository.js';
import { readNullableString, readNumber, readString } from './firestore-type-guards.js';

export class IngredientRepository
  extends BaseRepository<Ingredient, CreateIngredientDTO, UpdateIngredientDTO & Record<string, unknown>>
  implements INamedRepository<Ingredient>
{
  constructor(db?: Firestore) {
    super('ingredients', db);
  }

  protected parseEntity(id: string, data: Record<string, unknown>): Ingredient | null {
    const name = readString(data, 'name');
    const quantity = readNumber(data, 'quantity');
    const unit = readString(data, 'unit');
    const expirationDate = readNullableString(data, 'expiration_date');
    const createdAt = readString(data, 'created_at');
    const updatedAt = readString(data, 'updated_at');
    if (
      name === null ||
      quantity === null ||
      unit === null ||
      createdAt === null ||
      updatedAt === null
    ) {
      return null;
    }
    return {
      id,
      name,
      quantity,
      unit,
      expiration_date: expirationDate ?? null,
      category: readString(data, 'category') ?? 'other',
      cost_per_unit: readNumber(data, 'cost_per_unit') ?? 0,
      created_at: createdAt,
      updated_at: updatedAt,
    };
  }

  /**
   * Adds a pantry item. An item with the same name is replaced wholesale,
   * keeping its id and original created_at.
   */
  async create(data: CreateIngredientDTO): Promise<Ingredient> {
    const fields = {
      name: normalizeIngredientName(data.name),
      quantity: clampQuantity(data.quantity),
      unit: data.unit,
      expiration_date: data.expiration_date,
      category: data.category,
      cost_per_unit: data.cost_per_unit,
    };

    const existing = await this.findByName(fields.name);
    if (existing !== null) {
      const replacement = {
        ...fields,
        created_at: existing.created_at,
        updated_at: this.updateTimestamp(),
      };
      await this.collection.doc(existing.id).set(replacement);
      return { id: existing.id, ...replacement };
    }

    const ingredientData = { ...fields, ...this.createTimestamps() };
    const docRef = await this.collection.add(ingredientData);
    return {
      id: docRef.id,
      ...ingredientData,
    };
  }

  async findAll(): Promise<Ingredient[]> {
    const snapshot = await this.collection.orderBy('name').get();
    return this.docsToEntities(snapshot.docs);
  }

  async findByName(name: string): Promise<Ingredient | null> {
    return this.findOneWhere('name', normalizeIngredientName(name));
  }

  async deleteByName(name: string): Promise<boolean> {
    const existing = await this.findByName(name);
    if (existing === null) {
      return false;
    }
    await this.collection.doc(existing.id).delete();
    return true;
  }

  override async update(id: string, data: UpdateIngredientDTO & Record<string, unknown>): Promise<Ingredient | null> {
    if (data.name !== undefined) {
      const other = await this.findByName(data.name);
      if (other !== null && other.id !== id) {
        throw new ConflictError(`Ingredient "${other.name}" already exists`);
      }
    }
    return super.update(id, data);
  }

  /** Sets the on-hand quantity, clamping negatives to zero. */
  async setQuantity(id: string, quantity: number): Promise<Ingredient | null> {
    return this.update(id, { quantity: clampQuantity(quantity) });
  }

  protected override buildUpdatePayload(data: UpdateIngredientDTO & Record<string, unknown>): Record<string, unknown> {
    const updates = super.buildUpdatePayload(data);
    if (typeof updates['quantity'] === 'number') {
      updates['quantity'] = clampQuantity(updates['quantity']);
    }
    return updates;
  }
}
