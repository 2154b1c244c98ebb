import { z } from 'zod';
import { ChatMessage } from '../core/types.js';
import { ChatRequestBody, ProviderAdapter } from '../core/provider.js';

export const ANTHROPIC_VERSION = '2023-06-01';
export const ANTHROPIC_MAX_TOKENS = 8192;

// === Stream payload schema (trust boundary: API response) ===

const ContentBlockDeltaSchema = z.object({
  type: z.literal('content_block_delta'),
  delta: z.object({
    text: z.string().optional()
  })
});

export class AnthropicAdapter implements ProviderAdapter {
  readonly name = 'anthropic' as const;
  readonly defaultUrl = 'https://api.anthropic.com/v1/messages';

  buildHeaders(token: string): Record<string, string> {
    return {
      'x-api-key': token,
      'anthropic-version': ANTHROPIC_VERSION,
      'content-type': 'application/json',
      'accept': 'text/event-stream',
    };
  }

  buildBody(messages: ChatMessage[], model: string): ChatRequestBody {
    return {
      model,
      messages,
      max_tokens: ANTHROPIC_MAX_TOKENS,
      stream: true
    };
  }

  decode(payload: unknown): string | undefined {
    // message_start, ping, content_block_stop etc. carry no text
    const parsed = ContentBlockDeltaSchema.safeParse(payload);
    if (!parsed.success) return undefined;
    return parsed.data.delta.text || undefined;
  }
}
