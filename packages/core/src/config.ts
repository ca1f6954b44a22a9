/**
 * Model and loop configuration, read from the environment.
 *
 * An Azure endpoint takes precedence; without one the plain OpenAI API is used.
 */

import { ConfigError } from './errors.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const DEFAULT_AZURE_API_VERSION = '2024-06-01';
export const DEFAULT_MAX_ROUNDS = 15;

interface CommonModelConfig {
  model: string;
  apiKey: string;
  /** Per-request timeout for model calls */
  timeoutMs: number;
  /** Retries the SDK performs on 429/5xx before giving up */
  maxRetries: number;
}

export interface AzureModelConfig extends CommonModelConfig {
  provider: 'azure';
  endpoint: string;
  apiVersion: string;
}

export interface OpenAIModelConfig extends CommonModelConfig {
  provider: 'openai';
}

export type ModelConfig = AzureModelConfig | OpenAIModelConfig;

export interface AskdbConfig {
  model: ModelConfig;
  maxRounds: number;
}

type Env = Record<string, string | undefined>;

function intFromEnv(env: Env, name: string, def: number): number {
  const v = env[name];
  if (!v) return def;
  const n = parseInt(v, 10);
  return Number.isFinite(n) && n >= 0 ? n : def;
}

function required(env: Env, name: string): string {
  const v = env[name]?.trim();
  if (!v) {
    throw new ConfigError(`${name} is not set. Add it to your shell or to a .env file.`);
  }
  return v;
}

export function loadModelConfig(env: Env = process.env): ModelConfig {
  const timeoutMs = intFromEnv(env, 'ASKDB_TIMEOUT_MS', 60_000);
  const maxRetries = intFromEnv(env, 'ASKDB_MAX_RETRIES', 2);

  const endpoint = env.AZURE_OPENAI_ENDPOINT?.trim();
  if (endpoint) {
    return {
      provider: 'azure',
      endpoint,
      apiKey: required(env, 'AZURE_OPENAI_API_KEY'),
      apiVersion: env.AZURE_OPENAI_API_VERSION?.trim() || DEFAULT_AZURE_API_VERSION,
      model: required(env, 'AZURE_OPENAI_MODEL'),
      timeoutMs,
      maxRetries,
    };
  }

  return {
    provider: 'openai',
    apiKey: required(env, 'OPENAI_API_KEY'),
    model: env.ASKDB_MODEL?.trim() || DEFAULT_OPENAI_MODEL,
    timeoutMs,
    maxRetries,
  };
}

export function loadConfig(env: Env = process.env): AskdbConfig {
  const maxRounds = intFromEnv(env, 'ASKDB_MAX_ROUNDS', DEFAULT_MAX_ROUNDS);
  return {
    model: loadModelConfig(env),
    maxRounds: maxRounds > 0 ? maxRounds : DEFAULT_MAX_ROUNDS,
  };
}
