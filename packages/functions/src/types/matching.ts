import type { RecipeData } from './recipe.js';

export interface MatchResult {
  /** Fraction of required lines satisfied, in [0, 1]. */
  score: number;
  matched: string[];
  missing: string[];
}

export interface RecipeMatch<R = RecipeData> extends MatchResult {
  recipe: R;
}

export interface CanMakeResult {
  can_make: boolean;
  missing: string[];
}

/** Recipe fields the scorer reads. */
export type ScorableRecipe = Pick<RecipeData, 'ingredients'>;

/** Recipe fields the ranker and its filters read. */
export type RankableRecipe = Pick<
  RecipeData,
  'ingredients' | 'rating' | 'prep_time' | 'cook_time' | 'difficulty'
>;
