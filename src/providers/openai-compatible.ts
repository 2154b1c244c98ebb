import { z } from 'zod';
import { ChatMessage } from '../core/types.js';
import { ChatRequestBody, ProviderAdapter, ProviderOptions } from '../core/provider.js';

export const OPENROUTER_MODEL = 'anthropic/claude-3.5-sonnet';

// === Stream payload schema (trust boundary: API response) ===

const ChunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({
      content: z.string().nullish()
    }).optional()
  })).min(1)
});

/** `choices[0].delta.content` of an OpenAI-style chat completion chunk. */
function decodeChatChunk(payload: unknown): string | undefined {
  const parsed = ChunkSchema.safeParse(payload);
  if (!parsed.success) return undefined;
  return parsed.data.choices[0].delta?.content || undefined;
}

/** OneAPI and similar gateways: plain OpenAI chat completions with a bearer token. */
export class OneApiAdapter implements ProviderAdapter {
  readonly name = 'oneapi' as const;
  readonly defaultUrl: string | undefined = undefined;

  buildHeaders(token: string): Record<string, string> {
    return {
      'Authorization': `Bearer ${token}`,
      'Content-Type': 'application/json',
    };
  }

  buildBody(messages: ChatMessage[], model: string): ChatRequestBody {
    return { model, messages, stream: true };
  }

  decode(payload: unknown): string | undefined {
    return decodeChatChunk(payload);
  }
}

/**
 * OpenRouter always serves the vendor-qualified Claude model, whatever the
 * caller asked for, and wants the app to identify itself.
 */
export class OpenRouterAdapter implements ProviderAdapter {
  readonly name = 'openrouter' as const;
  readonly defaultUrl = 'https://openrouter.ai/api/v1/chat/completions';
  private referer: string;
  private title: string;

  constructor(options: ProviderOptions = {}) {
    this.referer = options.referer || 'https://localhost';
    this.title = options.title || 'claude-relay';
  }

  buildHeaders(token: string): Record<string, string> {
    return {
      'Authorization': `Bearer ${token}`,
      'Content-Type': 'application/json',
      'HTTP-Referer': this.referer,
      'X-Title': this.title,
    };
  }

  buildBody(messages: ChatMessage[], _model: string): ChatRequestBody {
    return { model: OPENROUTER_MODEL, messages, stream: true };
  }

  decode(payload: unknown): string | undefined {
    return decodeChatChunk(payload);
  }
}
