/**
 * AI settings resolution
 *
 * Priority: CLI flag > `.gapfill.yml` > GAPFILL_PROVIDER env > default.
 */

import { ConfigError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";
import type { Result } from "../lib/result.js";
import type { AISection } from "../cli/config.js";

import { API_KEY_ENV_VARS, DEFAULT_MODELS } from "./service.js";
import { AI_PROVIDERS } from "./types.js";
import type { AIConfig, AIProvider } from "./types.js";

export const PROVIDER_ENV_VAR = "GAPFILL_PROVIDER";
export const DEFAULT_PROVIDER: AIProvider = "anthropic";
export const DEFAULT_TEMPERATURE = 0.3;

export interface AIOverrides {
  provider?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  apiKey?: string;
}

export function isAIProvider(value: string): value is AIProvider {
  return (AI_PROVIDERS as readonly string[]).includes(value);
}

/**
 * Merge overrides, project settings and environment into a service config
 */
export function resolveAIConfig(
  section: AISection | undefined,
  overrides: AIOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Result<AIConfig, ConfigError> {
  const providerName = (
    overrides.provider ??
    section?.provider ??
    env[PROVIDER_ENV_VAR] ??
    DEFAULT_PROVIDER
  ).toLowerCase();

  if (!isAIProvider(providerName)) {
    return err(new ConfigError(
      `Unknown AI provider: ${providerName}. Available providers: ${AI_PROVIDERS.join(", ")}`,
      { provider: providerName }
    ));
  }

  const temperature = overrides.temperature ?? section?.temperature ?? DEFAULT_TEMPERATURE;
  if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
    return err(new ConfigError(`Temperature must be between 0 and 2, got ${temperature}`, { temperature }));
  }

  const maxTokens = overrides.maxTokens ?? section?.maxTokens;
  if (maxTokens !== undefined && (!Number.isInteger(maxTokens) || maxTokens <= 0)) {
    return err(new ConfigError(`Max tokens must be a positive integer, got ${maxTokens}`, { maxTokens }));
  }

  const config: AIConfig = {
    provider: providerName,
    model: overrides.model ?? section?.model ?? DEFAULT_MODELS[providerName],
    temperature,
  };
  if (maxTokens !== undefined) {
    config.maxTokens = maxTokens;
  }

  const apiKey = overrides.apiKey ?? (providerName === "mock" ? undefined : env[API_KEY_ENV_VARS[providerName]]);
  if (apiKey !== undefined && apiKey.length > 0) {
    config.apiKey = apiKey;
  }

  return ok(config);
}
