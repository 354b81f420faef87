// DeepSeek Provider
// OpenAI-compatible REST API over fetch

import { z } from 'zod';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';

const ChatCompletionBodySchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }).optional() })).optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export class DeepSeekProvider implements Provider {
  name = 'deepseek';
  defaultModel = 'deepseek-chat';
  private baseUrl = 'https://api.deepseek.com';

  constructor(private apiKey: string) {
    if (!this.apiKey) {
      throw new Error('DEEPSEEK_API_KEY not configured');
    }
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: options.model || this.defaultModel,
        messages,
        max_tokens: options.maxTokens ?? 1024,
        temperature: options.temperature ?? 0.3,
        stream: false,
        ...(options.json ? { response_format: { type: 'json_object' } } : {}),
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`DeepSeek API error: ${response.status} - ${error}`);
    }

    const data = ChatCompletionBodySchema.parse(await response.json());

    return {
      content: data.choices?.[0]?.message?.content || '',
      usage: {
        promptTokens: data.usage?.prompt_tokens || 0,
        completionTokens: data.usage?.completion_tokens || 0,
        totalTokens: data.usage?.total_tokens || 0,
      },
    };
  }
}
