import { z } from 'zod';

export type ShoppingCategory = z.infer<
  typeof import('../schemas/reference.schema.js').shoppingCategorySchema
>;

export interface ShoppingListItem {
  name: string;
  quantity: number;
  unit: string;
  category: ShoppingCategory;
}

export interface ShoppingListSummary {
  total_items: number;
  by_category: Partial<Record<ShoppingCategory, number>>;
}

/** Serving multipliers keyed by recipe name. */
export type ServingMultipliers = ReadonlyMap<string, number>;
