import { substitutionTableSchema } from '../schemas/reference.schema.js';
import type { SubstitutionOption } from '../shared.js';
import { loadReferenceTable } from './reference-data.js';

const SUBSTITUTIONS: ReadonlyMap<string, readonly SubstitutionOption[]> = new Map(
  Object.entries(loadReferenceTable('substitutions.json', substitutionTableSchema)).map(
    ([name, options]): [string, readonly SubstitutionOption[]] => [
      normalizeIngredientName(name),
      Object.freeze(options.map((option) => Object.freeze({ ...option }))),
    ]
  )
);

export function normalizeIngredientName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Alternatives for an ingredient in preference order. Unknown ingredients
 * have no alternatives.
 */
export function getSubstitutions(ingredientName: string): readonly SubstitutionOption[] {
  return SUBSTITUTIONS.get(normalizeIngredientName(ingredientName)) ?? [];
}

export function listSubstitutableIngredients(): string[] {
  return [...SUBSTITUTIONS.keys()];
}
