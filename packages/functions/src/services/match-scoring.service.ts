/**
 * Match Scoring Service
 *
 * Scores one recipe against the pantry. Each required line earns full credit
 * when enough is on hand, 0.8 when a listed substitute covers it, and nothing
 * otherwise; the score is the mean over required lines.
 *
 * Two scorers:
 * - scoreRecipe: standard-unit comparison with substitutions
 * - calculateMatchScore: raw quantities, same-unit assumption, no substitutes
 */

import type {
  MatchResult,
  PantryStock,
  RecipeIngredient,
  ScorableRecipe,
} from '../shared.js';
import { getSubstitutions, normalizeIngredientName } from './substitution.service.js';
import { toStandardUnit } from './unit-converter.service.js';

/** Credit for a line covered by a substitute instead of the ingredient itself. */
export const SUBSTITUTION_CREDIT = 0.8;

/**
 * Indexes pantry entries by normalized name. Names are the identity key, so a
 * later duplicate replaces an earlier one.
 */
export function buildPantryIndex<T extends PantryStock>(pantry: readonly T[]): Map<string, T> {
  const index = new Map<string, T>();
  for (const item of pantry) {
    index.set(normalizeIngredientName(item.name), item);
  }
  return index;
}

function requiredLines(recipe: ScorableRecipe): RecipeIngredient[] {
  return recipe.ingredients.filter((ingredient) => !ingredient.optional);
}

function describeShortfall(line: RecipeIngredient, onHand: PantryStock): string {
  return `${line.name} (need ${line.quantity} ${line.unit}, have ${onHand.quantity} ${onHand.unit})`;
}

function describeMissing(line: RecipeIngredient): string {
  return `${line.quantity} ${line.unit} ${line.name}`;
}

/**
 * Scores a recipe against the pantry with unit conversion and, optionally,
 * substitutions.
 *
 * Each required line earns 1 when the pantry holds enough of it (compared in
 * standard units), {@link SUBSTITUTION_CREDIT} when the first listed
 * substitute with enough quantity is on hand, and 0 otherwise. A line whose
 * ingredient is present but short is final: substitutes are only consulted
 * for ingredients the pantry does not hold at all. Substitute quantities are
 * compared as raw numbers after applying the ratio.
 *
 * A recipe with no required lines scores 1.
 */
export function scoreRecipe(
  recipe: ScorableRecipe,
  pantry: readonly PantryStock[],
  allowSubstitutions = true
): MatchResult {
  const required = requiredLines(recipe);
  if (required.length === 0) {
    return { score: 1, matched: [], missing: [] };
  }

  const available = buildPantryIndex(pantry);
  const matched: string[] = [];
  const missing: string[] = [];
  let credit = 0;

  for (const line of required) {
    const name = normalizeIngredientName(line.name);
    const onHand = available.get(name);

    if (onHand !== undefined) {
      const needed = toStandardUnit(line.quantity, line.unit);
      const have = toStandardUnit(onHand.quantity, onHand.unit);
      if (have >= needed) {
        credit += 1;
        matched.push(line.name);
      } else {
        missing.push(describeShortfall(line, onHand));
      }
      continue;
    }

    if (allowSubstitutions) {
      const substitute = getSubstitutions(name).find((option) => {
        const candidate = available.get(normalizeIngredientName(option.ingredient));
        return candidate !== undefined && candidate.quantity >= line.quantity * option.ratio;
      });
      if (substitute !== undefined) {
        credit += SUBSTITUTION_CREDIT;
        matched.push(`${substitute.ingredient} (sub for ${line.name})`);
        continue;
      }
    }

    missing.push(describeMissing(line));
  }

  return { score: credit / required.length, matched, missing };
}

/**
 * Quick availability check: direct name lookup and a plain numeric quantity
 * comparison that assumes recipe and pantry use the same unit. No conversion,
 * no substitutions. A recipe with no required lines scores 0 here, so the
 * quick listing leaves it out.
 */
export function calculateMatchScore(
  recipe: ScorableRecipe,
  pantry: readonly PantryStock[]
): MatchResult {
  const required = requiredLines(recipe);
  if (required.length === 0) {
    return { score: 0, matched: [], missing: [] };
  }

  const available = buildPantryIndex(pantry);
  const matched: string[] = [];
  const missing: string[] = [];

  for (const line of required) {
    const onHand = available.get(normalizeIngredientName(line.name));
    if (onHand === undefined) {
      missing.push(describeMissing(line));
    } else if (onHand.quantity >= line.quantity) {
      matched.push(line.name);
    } else {
      missing.push(describeShortfall(line, onHand));
    }
  }

  return { score: matched.length / required.length, matched, missing };
}
