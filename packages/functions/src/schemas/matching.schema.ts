import { z } from 'zod';
import { difficultySchema } from './recipe.schema.js';

/** Query-string booleans arrive as text. */
export const queryBooleanSchema = z.enum(['true', 'false']).transform((value) => value === 'true');

const minScoreSchema = z.coerce.number().min(0).max(1);

export const matchQuerySchema = z.object({
  min_score: minScoreSchema.optional(),
  allow_substitutions: queryBooleanSchema.optional(),
});

export const matchByTimeQuerySchema = z.object({
  max_time: z.coerce.number().int().nonnegative(),
  min_score: minScoreSchema.optional(),
});

export const matchByDifficultyQuerySchema = z.object({
  difficulty: difficultySchema,
  min_score: minScoreSchema.optional(),
});

export const canMakeQuerySchema = z.object({
  allow_substitutions: queryBooleanSchema.optional(),
});

export type MatchQueryInput = z.infer<typeof matchQuerySchema>;
export type MatchByTimeQueryInput = z.infer<typeof matchByTimeQuerySchema>;
export type MatchByDifficultyQueryInput = z.infer<typeof matchByDifficultyQuerySchema>;
export type CanMakeQueryInput = z.infer<typeof canMakeQuerySchema>;
