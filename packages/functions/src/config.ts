import { z } from 'zod';

const envSchema = z.object({
  APP_ENV: z.enum(['dev', 'prod']).default('dev'),
  FIRESTORE_COLLECTION_PREFIX: z.string().optional(),
  EXPIRING_SOON_DAYS: z.coerce.number().int().positive().default(7),
});

export interface AppConfig {
  env: 'dev' | 'prod';
  /** Prepended to every Firestore collection name. */
  collectionPrefix: string;
  /** Default look-ahead window for the expiring-ingredients listing. */
  expiringSoonDays: number;
}

/**
 * Resolves configuration from environment variables. Dev deployments write to
 * `dev_`-prefixed collections unless an explicit prefix is set.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    env: parsed.APP_ENV,
    collectionPrefix: parsed.FIRESTORE_COLLECTION_PREFIX ?? (parsed.APP_ENV === 'dev' ? 'dev_' : ''),
    expiringSoonDays: parsed.EXPIRING_SOON_DAYS,
  };
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cachedConfig === null) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

// For tests
export function resetConfig(): void {
  cachedConfig = null;
}
