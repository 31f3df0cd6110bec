/**
 * Anthropic Claude API Client
 * Client construction for answer synthesis
 */

import Anthropic from '@anthropic-ai/sdk';
import { logger } from './logger.js';
import { ConfigError } from './errors.js';
import type { AppConfig } from './config.js';

/**
 * Create an Anthropic client from configuration.
 * The circuit breaker owns timeouts, so SDK retries are disabled.
 */
export function createAnthropicClient(config: Pick<AppConfig, 'synthesis'>): Anthropic {
  const { apiKey, timeoutMs } = config.synthesis;

  if (!apiKey) {
    throw new ConfigError('Anthropic client requires an API key', ['ANTHROPIC_API_KEY: Required']);
  }

  const client = new Anthropic({
    apiKey,
    maxRetries: 0,
    timeout: timeoutMs,
  });

  logger.info({ model: config.synthesis.model }, 'Anthropic client initialized');

  return client;
}

export { Anthropic };
