import { describe, it, expect } from 'vitest';
import {
  getSubstitutions,
  listSubstitutableIngredients,
  normalizeIngredientName,
} from './substitution.service.js';

describe('substitution.service', () => {
  describe('normalizeIngredientName', () => {
    it('should trim and lowercase', () => {
      expect(normalizeIngredientName('  Brown Sugar ')).toBe('brown sugar');
    });
  });

  describe('listSubstitutableIngredients', () => {
    it('should list the seeded ingredients in table order', () => {
      expect(listSubstitutableIngredients()).toEqual([
        'milk',
        'butter',
        'egg',
        'all-purpose flour',
        'sugar',
        'yogurt',
      ]);
    });
  });

  describe('getSubstitutions', () => {
    it('should return options in preference order', () => {
      expect(getSubstitutions('egg').map((option) => option.ingredient)).toEqual([
        'flax egg',
        'banana',
        'applesauce',
      ]);
    });

    it('should carry ratio and notes', () => {
      expect(getSubstitutions('butter')[0]).toEqual({
        ingredient: 'oil',
        ratio: 0.75,
        notes: 'Use 3/4 the amount',
      });
    });

    it('should match names case-insensitively', () => {
      expect(getSubstitutions(' Milk ')).toEqual(getSubstitutions('milk'));
      expect(getSubstitutions(' Milk ')).toHaveLength(4);
    });

    it('should return an empty list for unknown ingredients', () => {
      expect(getSubstitutions('saffron')).toEqual([]);
    });

    it('should hand out frozen options', () => {
      const options = getSubstitutions('sugar');
      expect(Object.isFrozen(options)).toBe(true);
      expect(Object.isFrozen(options[0])).toBe(true);
    });
  });
});
