// src/config.ts
import { z } from 'zod';
import { DEFAULT_TIMEOUT } from './loader/fetch.js';
import { DEFAULT_ID_FIELDS } from './loader/document.js';

export interface DepotConfig {
  fetchTimeout: number;
  idFields: string[];
  debug: boolean;
}

const envSchema = z.object({
  SCHEMA_DEPOT_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
  SCHEMA_DEPOT_ID_FIELDS: z.string()
    .transform(value => value.split(',').map(field => field.trim()).filter(field => field.length > 0))
    .pipe(z.array(z.string()).min(1))
    .optional(),
  SCHEMA_DEPOT_DEBUG: z.string().optional(),
});

/** Read settings from the environment. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DepotConfig {
  const parsed = envSchema.parse(env);
  return {
    fetchTimeout: parsed.SCHEMA_DEPOT_FETCH_TIMEOUT_MS,
    idFields: parsed.SCHEMA_DEPOT_ID_FIELDS ?? [...DEFAULT_ID_FIELDS],
    debug: parsed.SCHEMA_DEPOT_DEBUG === '1' || parsed.SCHEMA_DEPOT_DEBUG === 'true',
  };
}
