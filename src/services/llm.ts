/**
 * LLM integration layer using Vercel AI SDK.
 * Supports multiple LLM providers: OpenAI and Anthropic.
 */

import type { LanguageModel } from 'ai';
import { config } from '../config.js';
import type { Config } from '../config.js';
import { logger } from '../utils/logger.js';
import { LLMError } from '../types/errors.js';

/**
 * Initialize the language model based on the configured provider.
 * Provider packages are imported on demand.
 */
export async function initializeModel(
  llmConfig: Config['LLM_CONFIG'] = config.LLM_CONFIG
): Promise<LanguageModel> {
  const { provider, model: modelId, apiKey } = llmConfig;

  logger.info(`Initializing LLM: ${provider}/${modelId}`);

  try {
    switch (provider) {
      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey })(modelId);
      }

      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        return createAnthropic({ apiKey })(modelId);
      }
    }
  } catch (error) {
    throw new LLMError(`Failed to initialize ${provider}/${modelId}: ${error}`);
  }
}
