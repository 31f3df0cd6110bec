/**
 * OpenAI API Client
 * Provides embedding generation capabilities
 */

import OpenAI from 'openai';
import { logger } from './logger.js';
import { ConfigError } from './errors.js';
import type { AppConfig } from './config.js';

/**
 * Create an OpenAI client from configuration.
 * Retries are owned by the embedding dispatcher, so the SDK's own are disabled.
 */
export function createOpenAIClient(config: Pick<AppConfig, 'openai'>, timeoutMs = 30000): OpenAI {
  const { apiKey, baseUrl } = config.openai;

  if (!apiKey) {
    throw new ConfigError('OpenAI client requires an API key', ['OPENAI_API_KEY: Required']);
  }

  const client = new OpenAI({
    apiKey,
    baseURL: baseUrl,
    maxRetries: 0,
    timeout: timeoutMs,
  });

  logger.info({ baseUrl: baseUrl ?? 'default' }, 'OpenAI client initialized');

  return client;
}

export { OpenAI };
