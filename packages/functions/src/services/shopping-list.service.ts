/**
 * Shopping List Service
 *
 * Aggregates the required lines of several recipes, nets them against the
 * pantry and groups what is left by store category for display.
 */

import { warn } from 'firebase-functions/logger';
import { categoryKeywordsSchema } from '../schemas/reference.schema.js';
import type {
  PantryStock,
  ScorableRecipe,
  ServingMultipliers,
  ShoppingCategory,
  ShoppingListItem,
  ShoppingListSummary,
} from '../shared.js';
import { buildPantryIndex } from './match-scoring.service.js';
import { loadReferenceTable } from './reference-data.js';
import { normalizeIngredientName } from './substitution.service.js';
import {
  convertUnits,
  formatQuantity,
  getStandardUnitFor,
  roundTo,
  toStandardUnit,
} from './unit-converter.service.js';

const CATEGORY_KEYWORDS = Object.freeze(
  loadReferenceTable('ingredient-categories.json', categoryKeywordsSchema)
);

// First matching category wins.
const CATEGORY_ORDER = ['vegetables', 'fruits', 'dairy', 'meat', 'grains', 'spices'] as const;

const CATEGORY_LABELS: Readonly<Record<ShoppingCategory, string>> = {
  vegetables: '🥬 Vegetables',
  fruits: '🍎 Fruits',
  dairy: '🥛 Dairy',
  meat: '🥩 Meat & Poultry',
  grains: '🌾 Grains & Bread',
  spices: '🧂 Spices & Seasonings',
  other: '📦 Other',
};

export const EMPTY_SHOPPING_LIST_MESSAGE = '✅ You have all ingredients needed!';

export interface ShoppingListRecipe extends ScorableRecipe {
  name: string;
}

interface Requirement {
  /** Running total in the dimension's standard unit. */
  quantity: number;
  /** Unit of the last recipe line seen for this ingredient. */
  unit: string;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Keyword-based display grouping; substring matches, checked in a fixed order. */
export function guessCategory(ingredientName: string): ShoppingCategory {
  const name = ingredientName.toLowerCase();
  for (const category of CATEGORY_ORDER) {
    if (CATEGORY_KEYWORDS[category].some((keyword) => name.includes(keyword))) {
      return category;
    }
  }
  return 'other';
}

/**
 * Sums the required lines of every selected recipe (scaled by the recipe's
 * serving multiplier), nets the totals against the pantry and returns what is
 * left to buy, sorted by category then name.
 *
 * Totals are carried in standard units and projected back to the unit of the
 * last line seen for each ingredient. Ingredients the pantry covers are
 * omitted, as are quantities that cannot be projected or round to nothing.
 */
export function generateShoppingList(
  recipes: readonly ShoppingListRecipe[],
  pantry: readonly PantryStock[],
  multipliers: ServingMultipliers = new Map()
): ShoppingListItem[] {
  const requirements = new Map<string, Requirement>();

  for (const recipe of recipes) {
    const multiplier = multipliers.get(recipe.name) ?? 1;

    for (const line of recipe.ingredients) {
      if (line.optional) {
        continue;
      }
      const name = normalizeIngredientName(line.name);
      const standardQuantity = toStandardUnit(line.quantity * multiplier, line.unit);
      const previous = requirements.get(name)?.quantity ?? 0;
      requirements.set(name, { quantity: previous + standardQuantity, unit: line.unit });
    }
  }

  const available = buildPantryIndex(pantry);
  const items: ShoppingListItem[] = [];

  for (const [name, requirement] of requirements) {
    const onHand = available.get(name);
    let shortfall = requirement.quantity;

    if (onHand !== undefined) {
      const have = toStandardUnit(onHand.quantity, onHand.unit);
      if (have >= requirement.quantity) {
        continue;
      }
      shortfall = requirement.quantity - have;
    }

    const quantity = convertUnits(shortfall, getStandardUnitFor(requirement.unit), requirement.unit);
    if (quantity === null) {
      warn('shopping_list:unconvertible_quantity', { ingredient: name, unit: requirement.unit });
      continue;
    }
    const rounded = roundTo(quantity, 2);
    if (rounded <= 0) {
      continue;
    }

    items.push({
      name,
      quantity: rounded,
      unit: requirement.unit,
      category: guessCategory(name),
    });
  }

  return items.sort(
    (a, b) => compareText(a.category, b.category) || compareText(a.name, b.name)
  );
}

/** Renders a shopping list as checklist text grouped under category headers. */
export function formatShoppingList(items: readonly ShoppingListItem[]): string {
  if (items.length === 0) {
    return EMPTY_SHOPPING_LIST_MESSAGE;
  }

  const byCategory = new Map<ShoppingCategory, ShoppingListItem[]>();
  for (const item of items) {
    const group = byCategory.get(item.category) ?? [];
    group.push(item);
    byCategory.set(item.category, group);
  }

  const lines = ['🛒 SHOPPING LIST', '='.repeat(50)];
  const categories = [...byCategory.keys()].sort(compareText);

  for (const category of categories) {
    lines.push('', `${CATEGORY_LABELS[category]}:`);
    const group = [...(byCategory.get(category) ?? [])].sort((a, b) => compareText(a.name, b.name));
    for (const item of group) {
      lines.push(`  ☐ ${formatQuantity(item.quantity, item.unit)} ${item.name}`);
    }
  }

  return lines.join('\n');
}

export function summarizeShoppingList(items: readonly ShoppingListItem[]): ShoppingListSummary {
  const byCategory: Partial<Record<ShoppingCategory, number>> = {};
  for (const item of items) {
    byCategory[item.category] = (byCategory[item.category] ?? 0) + 1;
  }
  return { total_items: items.length, by_category: byCategory };
}
