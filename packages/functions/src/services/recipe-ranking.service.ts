import type {
  CanMakeResult,
  Difficulty,
  PantryStock,
  RankableRecipe,
  RecipeMatch,
  ScorableRecipe,
} from '../shared.js';
import { calculateMatchScore, scoreRecipe } from './match-scoring.service.js';

export const DEFAULT_MIN_MATCH_SCORE = 0.7;
export const DEFAULT_SUGGESTION_MIN_SCORE = 0.8;

export interface FindMatchesOptions {
  minScore?: number;
  allowSubstitutions?: boolean;
}

export function totalTime(recipe: Pick<RankableRecipe, 'prep_time' | 'cook_time'>): number {
  return recipe.prep_time + recipe.cook_time;
}

function byScoreThenRating<R extends RankableRecipe>(a: RecipeMatch<R>, b: RecipeMatch<R>): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return b.recipe.rating - a.recipe.rating;
}

/**
 * Scores every recipe, keeps those at or above `minScore` and orders them by
 * score, then rating, both descending. Ties on both keep catalog order.
 */
export function findMatchingRecipes<R extends RankableRecipe>(
  pantry: readonly PantryStock[],
  recipes: readonly R[],
  options: FindMatchesOptions = {}
): RecipeMatch<R>[] {
  const minScore = options.minScore ?? DEFAULT_MIN_MATCH_SCORE;
  const allowSubstitutions = options.allowSubstitutions ?? true;

  const matches: RecipeMatch<R>[] = [];
  for (const recipe of recipes) {
    const result = scoreRecipe(recipe, pantry, allowSubstitutions);
    if (result.score >= minScore) {
      matches.push({ recipe, ...result });
    }
  }

  return matches.sort(byScoreThenRating);
}

export function canMakeRecipe(
  recipe: ScorableRecipe,
  pantry: readonly PantryStock[],
  allowSubstitutions = true
): CanMakeResult {
  const { score, missing } = scoreRecipe(recipe, pantry, allowSubstitutions);
  return { can_make: score >= 1, missing };
}

export function suggestRecipesByTime<R extends RankableRecipe>(
  pantry: readonly PantryStock[],
  recipes: readonly R[],
  maxTime: number,
  minScore = DEFAULT_SUGGESTION_MIN_SCORE
): RecipeMatch<R>[] {
  const quick = recipes.filter((recipe) => totalTime(recipe) <= maxTime);
  return findMatchingRecipes(pantry, quick, { minScore });
}

export function suggestRecipesByDifficulty<R extends RankableRecipe>(
  pantry: readonly PantryStock[],
  recipes: readonly R[],
  difficulty: Difficulty,
  minScore = DEFAULT_SUGGESTION_MIN_SCORE
): RecipeMatch<R>[] {
  const filtered = recipes.filter((recipe) => recipe.difficulty === difficulty);
  return findMatchingRecipes(pantry, filtered, { minScore });
}

/**
 * Listing for a quick "what can I cook" view: the simple scorer, every recipe
 * with at least one line on hand, best first.
 */
export function rankByAvailability<R extends ScorableRecipe>(
  pantry: readonly PantryStock[],
  recipes: readonly R[]
): RecipeMatch<R>[] {
  return recipes
    .map((recipe) => ({ recipe, ...calculateMatchScore(recipe, pantry) }))
    .filter((match) => match.score > 0)
    .sort((a, b) => b.score - a.score);
}
