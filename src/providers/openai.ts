// OpenAI Provider
// Chat completions through the official SDK; also serves OpenAI-compatible gateways

import OpenAI from 'openai';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';

export class OpenAIProvider implements Provider {
  name = 'openai';
  defaultModel = 'gpt-4o-mini';
  private client: OpenAI;

  constructor(apiKey: string, baseURL?: string) {
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY not configured');
    }
    this.client = new OpenAI({ apiKey, ...(baseURL ? { baseURL } : {}) });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const completion = await this.client.chat.completions.create(
      {
        model: options.model || this.defaultModel,
        messages,
        max_tokens: options.maxTokens ?? 1024,
        temperature: options.temperature ?? 0.3,
        ...(options.json ? { response_format: { type: 'json_object' as const } } : {}),
      },
      { signal: options.signal },
    );

    return {
      content: completion.choices[0]?.message?.content ?? '',
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
    };
  }
}
