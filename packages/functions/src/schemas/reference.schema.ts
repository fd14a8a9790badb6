import { z } from 'zod';

// ============ Static lookup tables (data/*.json) ============

const conversionFactorsSchema = z.record(z.string(), z.number().positive());

export const unitTableSchema = z.object({
  volume: conversionFactorsSchema,
  weight: conversionFactorsSchema,
  temperature: z.array(z.string()).min(1),
});

export const substitutionOptionSchema = z.object({
  ingredient: z.string().min(1),
  ratio: z.number().positive().default(1),
  notes: z.string(),
});

export const substitutionTableSchema = z.record(z.string(), z.array(substitutionOptionSchema));

export const shoppingCategorySchema = z.enum([
  'vegetables',
  'fruits',
  'dairy',
  'meat',
  'grains',
  'spices',
  'other',
]);

export const categoryKeywordsSchema = z.object({
  vegetables: z.array(z.string()),
  fruits: z.array(z.string()),
  dairy: z.array(z.string()),
  meat: z.array(z.string()),
  grains: z.array(z.string()),
  spices: z.array(z.string()),
});

// ============ Reference endpoint queries ============

export const convertQuerySchema = z.object({
  quantity: z.coerce.number().finite(),
  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
});

export type UnitTable = z.infer<typeof unitTableSchema>;
export type SubstitutionOptionInput = z.infer<typeof substitutionOptionSchema>;
export type CategoryKeywords = z.infer<typeof categoryKeywordsSchema>;
export type ConvertQueryInput = z.infer<typeof convertQuerySchema>;
