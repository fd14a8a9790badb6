import type {
  ExpiringIngredient,
  Ingredient,
  KitchenStats,
  RankableRecipe,
} from '../shared.js';
import { totalTime } from './recipe-ranking.service.js';
import { roundTo } from './unit-converter.service.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export const DEFAULT_EXPIRING_WITHIN_DAYS = 7;

export function clampQuantity(quantity: number): number {
  return Math.max(0, quantity);
}

function utcDayNumber(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) / MS_PER_DAY;
}

function parseIsoDate(value: string): number | null {
  const [year, month, day] = value.split('-').map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    return null;
  }
  const time = Date.UTC(year, month - 1, day);
  return Number.isNaN(time) ? null : time / MS_PER_DAY;
}

/** Whole days from `today` until expiry; negative once expired, null without a date. */
export function daysUntilExpiry(
  item: Pick<Ingredient, 'expiration_date'>,
  today: Date = new Date()
): number | null {
  if (item.expiration_date === null) {
    return null;
  }
  const expiry = parseIsoDate(item.expiration_date);
  return expiry === null ? null : expiry - utcDayNumber(today);
}

export function isExpired(
  item: Pick<Ingredient, 'expiration_date'>,
  today: Date = new Date()
): boolean {
  const days = daysUntilExpiry(item, today);
  return days !== null && days < 0;
}

/**
 * Items that expire within `days` (already expired ones included), soonest
 * first. Items without an expiration date never appear.
 */
export function getExpiringIngredients(
  items: readonly Ingredient[],
  days: number = DEFAULT_EXPIRING_WITHIN_DAYS,
  today: Date = new Date()
): ExpiringIngredient[] {
  const expiring: ExpiringIngredient[] = [];
  for (const item of items) {
    const daysLeft = daysUntilExpiry(item, today);
    if (daysLeft !== null && daysLeft <= days) {
      expiring.push({ ...item, days_until_expiry: daysLeft });
    }
  }
  return expiring.sort((a, b) => a.days_until_expiry - b.days_until_expiry);
}

export interface UseQuantityResult<T> {
  ok: boolean;
  item: T;
}

/** Takes `amount` out of stock when enough is on hand; otherwise leaves the item as is. */
export function useQuantity<T extends Pick<Ingredient, 'quantity'>>(
  item: T,
  amount: number
): UseQuantityResult<T> {
  if (item.quantity < amount) {
    return { ok: false, item };
  }
  return { ok: true, item: { ...item, quantity: item.quantity - amount } };
}

export function computeKitchenStats(
  ingredients: readonly Ingredient[],
  recipes: readonly RankableRecipe[],
  today: Date = new Date()
): KitchenStats {
  const averageTotalTime = recipes.length === 0
    ? null
    : roundTo(recipes.reduce((sum, recipe) => sum + totalTime(recipe), 0) / recipes.length, 1);

  return {
    total_ingredients: ingredients.length,
    total_recipes: recipes.length,
    average_total_time: averageTotalTime,
    expired_ingredients: ingredients.filter((item) => isExpired(item, today)).length,
  };
}
