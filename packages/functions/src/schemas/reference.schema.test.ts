import { describe, expect, it } from 'vitest';
import {
  convertQuerySchema,
  substitutionOptionSchema,
  unitTableSchema,
} from './reference.schema.js';

describe('convertQuerySchema', () => {
  it('coerces the quantity and trims units', () => {
    const result = convertQuerySchema.safeParse({ quantity: '2.5', from: ' cups ', to: 'ml' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ quantity: 2.5, from: 'cups', to: 'ml' });
    }
  });

  it('rejects non-numeric quantities and blank units', () => {
    expect(convertQuerySchema.safeParse({ quantity: 'lots', from: 'cups', to: 'ml' }).success).toBe(false);
    expect(convertQuerySchema.safeParse({ quantity: '1', from: ' ', to: 'ml' }).success).toBe(false);
  });
});

describe('substitutionOptionSchema', () => {
  it('defaults the ratio to 1', () => {
    const result = substitutionOptionSchema.safeParse({ ingredient: 'margarine', notes: 'Direct substitution' });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.ratio).toBe(1);
    }
  });
});

describe('unitTableSchema', () => {
  it('rejects non-positive conversion factors', () => {
    const result = unitTableSchema.safeParse({
      volume: { ml: 1, cup: 0 },
      weight: { g: 1 },
      temperature: ['celsius'],
    });

    expect(result.success).toBe(false);
  });
});
