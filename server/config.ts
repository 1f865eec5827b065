/**
 * Environment configuration.
 *
 * Missing API keys never fail startup; the matching expert or gateway just
 * reports itself unavailable.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalKey = z
  .string()
  .optional()
  .transform(v => (v && v.trim().length > 0 ? v.trim() : undefined));

const ms = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),

  OPENAI_API_KEY: optionalKey,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  GOOGLE_API_KEY: optionalKey,
  AWS_ACCESS_KEY_ID: optionalKey,
  AWS_SECRET_ACCESS_KEY: optionalKey,
  AWS_REGION: z.string().default('us-east-1'),
  JINA_API_KEY: optionalKey,
  EBAY_OAUTH_TOKEN: optionalKey,
  EBAY_MARKETPLACE_ID: z.string().default('EBAY_US'),
  EBAY_API_BASE: z.string().url().default('https://api.ebay.com'),

  EXPERT_TIMEOUT_MS: ms(8000),
  SYNTHESIS_TIMEOUT_MS: ms(15000),
  LOCALIZATION_TIMEOUT_MS: ms(5000),
  MARKETPLACE_TIMEOUT_MS: ms(10000),
  IMAGE_FETCH_TIMEOUT_MS: ms(5000),
  EMBEDDING_TIMEOUT_MS: ms(10000),

  SEARCH_LIMIT: z.coerce.number().int().min(1).max(200).default(20),
  MAX_QUERY_ATTEMPTS: z.coerce.number().int().min(1).max(4).default(3),
});

export type AppConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

let cachedConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}
