/**
 * src/config/env.ts
 * What: Environment configuration loader/validator.
 * How: loadConfig() reads .env via dotenv, then parseConfig() validates with zod and throws a ConfigurationError
 *      listing every issue. Only the server entrypoint reads the environment; library components take options.
 *        - VAULT_PASSPHRASE is required and is never logged.
 *        - EMBEDDING_DIMENSION is optional: a vault created without it locks its width on first insert.
 *        - LLM_BASE_URL should point at a local OpenAI-compatible server (llama.cpp server, Ollama).
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const intWithDefault = (def: number) =>
  z.preprocess((v: unknown) => (typeof v === 'string' ? parseInt(v, 10) : v), z.number().int().positive().default(def));

const optionalInt = z.preprocess(
  (v: unknown) => (typeof v === 'string' ? (v.trim() === '' ? undefined : parseInt(v, 10)) : v),
  z.number().int().positive().optional(),
);

const boolWithDefault = (def: boolean) =>
  z.preprocess(
    (v: unknown) => (typeof v === 'string' ? ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase()) : v),
    z.boolean().default(def),
  );

const schema = z.object({
  VAULT_DB_PATH: z.string().min(1).default('./data/vault.db'),
  VAULT_PASSPHRASE: z.string({ required_error: 'VAULT_PASSPHRASE is required' }).min(1, 'VAULT_PASSPHRASE is required'),
  EMBEDDING_DIMENSION: optionalInt,
  REQUIRE_VECTOR_INDEX: boolWithDefault(true),
  LLM_BASE_URL: z.string().url().default('http://127.0.0.1:8080/v1'),
  LLM_API_KEY: z.string().min(1).default('local'),
  EMBED_MODEL: z.string().optional(),
  CHAT_MODEL: z.string().optional(),
  PORT: intWithDefault(3000),
  CONTEXT_WINDOW_TOKENS: intWithDefault(8192),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  NODE_ENV: z.enum(['production', 'development', 'test']).optional().default('development'),
});

export type AppConfig = z.infer<typeof schema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
