import { ChatMessage } from "./types.js";

export type ProviderName = "anthropic" | "openrouter" | "oneapi";

export const PROVIDER_NAMES: readonly ProviderName[] = ["anthropic", "openrouter", "oneapi"];

export interface ChatRequestBody {
  model: string;
  messages: ChatMessage[];
  stream: true;
  max_tokens?: number;
}

/**
 * Everything that differs between backends: how to authenticate, what the
 * request body looks like and where the text sits in a stream payload.
 */
export interface ProviderAdapter {
  name: ProviderName;
  defaultUrl?: string;
  buildHeaders(token: string): Record<string, string>;
  buildBody(messages: ChatMessage[], model: string): ChatRequestBody;
  /** Text fragment carried by one parsed `data:` payload, if any. */
  decode(payload: unknown): string | undefined;
}

export interface ProviderOptions {
  /** Sent as `HTTP-Referer` to OpenRouter. */
  referer?: string;
  /** Sent as `X-Title` to OpenRouter. */
  title?: string;
}
