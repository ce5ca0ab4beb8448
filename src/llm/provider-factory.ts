import OpenAI, { AzureOpenAI } from 'openai';
import { LLMProvider, LLMProviderConfig } from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { logger } from '../observability/logger';

/**
 * Create the model provider for the startup configuration.
 * The configuration is a tagged variant; nothing downstream inspects the environment.
 */
export function createProvider(config: LLMProviderConfig): LLMProvider {
  const log = logger.child({ component: 'provider-factory' });

  switch (config.kind) {
    case 'openai': {
      const client = new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        maxRetries: config.maxRetries,
      });
      log.info({ model: config.model }, 'OpenAI provider initialized');
      return new OpenAIProvider(client, {
        name: 'openai',
        model: config.model,
        temperature: config.temperature,
      });
    }
    case 'azure': {
      const client = new AzureOpenAI({
        endpoint: config.endpoint,
        apiKey: config.apiKey,
        apiVersion: config.apiVersion,
        deployment: config.deployment,
        timeout: config.timeoutMs,
        maxRetries: config.maxRetries,
      });
      log.info({ endpoint: config.endpoint, deployment: config.deployment }, 'Azure OpenAI provider initialized');
      return new OpenAIProvider(client, {
        name: 'azure',
        model: config.deployment,
        temperature: config.temperature,
      });
    }
    default: {
      const unreachable: never = config;
      throw new Error(`Unknown LLM provider config: ${JSON.stringify(unreachable)}`);
    }
  }
}
