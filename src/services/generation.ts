// Language generation collaborator
// Thin wrapper over the configured chat provider

import { env } from '../env.js';
import { getProvider } from '../providers/index.js';
import type { Provider } from '../providers/index.js';

export interface GenerationRequest {
  system: string;
  prompt: string;
  json?: boolean;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface TextGenerator {
  readonly name: string;
  generate(request: GenerationRequest): Promise<string>;
}

export class ProviderTextGenerator implements TextGenerator {
  readonly name: string;

  constructor(
    private provider: Provider,
    private model = provider.defaultModel,
  ) {
    this.name = `${provider.name}:${this.model}`;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const response = await this.provider.sendChat(
      [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
      {
        model: this.model,
        maxTokens: request.maxTokens,
        json: request.json,
        signal: request.signal,
      },
    );
    return response.content.trim();
  }
}

/** Undefined when no provider is configured; callers fall back to templates. */
export function createTextGenerator(): TextGenerator | undefined {
  const provider = getProvider(env.LLM_PROVIDER);
  if (!provider) {
    return undefined;
  }
  return new ProviderTextGenerator(provider, env.LLM_MODEL || provider.defaultModel);
}
