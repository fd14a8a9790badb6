import { readFileSync } from 'node:fs';
import type { ZodType, ZodTypeDef } from 'zod';

const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Reads one of the lookup tables shipped in `data/` and validates it.
 * Callers load their table once at module start and freeze the result.
 */
export function loadReferenceTable<T>(
  fileName: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): T {
  const raw = readFileSync(new URL(fileName, DATA_DIR), 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return schema.parse(parsed);
}
