export interface KitchenStats {
  total_ingredients: number;
  total_recipes: number;
  /** Mean of prep + cook minutes, one decimal; null with an empty catalog. */
  average_total_time: number | null;
  expired_ingredients: number;
}
