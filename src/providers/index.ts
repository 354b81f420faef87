// Provider Registry
// Resolves the configured chat provider, created lazily and cached

import type { Provider } from './types.js';
import { DeepSeekProvider } from './deepseek.js';
import { OpenAIProvider } from './openai.js';
import { env, isProviderConfigured } from '../env.js';
import type { LlmProviderName } from '../env.js';

const providers: Map<LlmProviderName, Provider> = new Map();

function createProvider(name: LlmProviderName): Provider | null {
  switch (name) {
    case 'deepseek':
      return new DeepSeekProvider(env.DEEPSEEK_API_KEY);
    case 'openai':
      return new OpenAIProvider(env.OPENAI_API_KEY, env.OPENAI_BASE_URL || undefined);
    default:
      return null;
  }
}

/** Returns null when the provider is "none" or has no credentials. */
export function getProvider(name: LlmProviderName = env.LLM_PROVIDER): Provider | null {
  const cached = providers.get(name);
  if (cached) {
    return cached;
  }

  if (!isProviderConfigured(name)) {
    return null;
  }

  const provider = createProvider(name);
  if (provider) {
    providers.set(name, provider);
  }
  return provider;
}

export function listAvailableProviders(): LlmProviderName[] {
  const all: LlmProviderName[] = ['deepseek', 'openai'];
  return all.filter(isProviderConfigured);
}

export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';
