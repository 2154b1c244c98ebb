import { z } from 'zod';
import { ChatMessage, FailureReason, OutputEvent, StreamOutcome } from './types.js';
import { ChatRequestBody, ProviderAdapter, ProviderOptions } from './provider.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { TokenPool } from './token-pool.js';
import { readSseData } from './sse.js';
import { resolveProvider } from '../providers/index.js';
import { Logger, consoleLogger } from '../lib/logger.js';
import { Tracer, TraceSpan } from '../lib/tracer.js';
import { Transport, TransportResponse, fetchTransport } from '../lib/transport.js';

export const DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';
export const QUOTA_EXHAUSTED_CODE = 'insufficient_user_quota';

export interface ClaudeClientConfig {
  pool: TokenPool;
  provider?: string;       // default: anthropic
  apiKey?: string;         // used before any pool token
  apiUrl?: string;         // default: the provider's endpoint
  transport?: Transport;
  logger?: Logger;
  tracer?: Tracer;
  /** Append an `error` event before ending a failed stream instead of ending silently. */
  reportErrors?: boolean;
  providerOptions?: ProviderOptions;
}

// === Error body schema (trust boundary: API response) ===

const ErrorBodySchema = z.object({
  error: z.object({
    code: z.string().optional()
  })
});

type SendResult =
  | { ok: true; response: TransportResponse }
  | { ok: false; reason: FailureReason; message: string };

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;  // not JSON
  }
}

function errorCode(body: string): string | undefined {
  const parsed = ErrorBodySchema.safeParse(parseJson(body));
  return parsed.success ? parsed.data.error.code : undefined;
}

export class ClaudeClient {
  readonly provider: ProviderAdapter;
  readonly apiUrl: string;
  private pool: TokenPool;
  private apiKey: string;
  private transport: Transport;
  private logger: Logger;
  private tracer?: Tracer;
  private reportErrors: boolean;

  constructor(config: ClaudeClientConfig) {
    this.provider = resolveProvider(config.provider || 'anthropic', config.providerOptions);
    this.pool = config.pool;
    this.transport = config.transport || fetchTransport;
    this.logger = config.logger || consoleLogger;
    this.tracer = config.tracer;
    this.reportErrors = config.reportErrors ?? false;

    const apiKey = config.apiKey || this.pool.next();
    if (!apiKey) {
      throw new ConfigurationError('No API key given and no token available in the pool');
    }
    this.apiKey = apiKey;

    const apiUrl = config.apiUrl || this.provider.defaultUrl;
    if (!apiUrl) {
      throw new ConfigurationError(`Provider "${this.provider.name}" needs an explicit API URL`);
    }
    this.apiUrl = apiUrl;
  }

  get activeToken(): string {
    return this.apiKey;
  }

  /**
   * Stream a chat completion as `answer` events.
   *
   * Quota errors rotate to the next pool token and resend the same request.
   * Any other failure is logged and ends the stream; with `reportErrors` a
   * final `error` event says why.
   */
  async *streamChat(messages: ChatMessage[], model: string = DEFAULT_MODEL): AsyncGenerator<OutputEvent> {
    const body = this.provider.buildBody(messages, model);
    const span = this.tracer?.startSpan();
    const started = Date.now();
    let outcome: StreamOutcome = 'completed';
    let answers = 0;

    this.logger.info(`Streaming from ${this.provider.name} with model ${body.model}`);

    try {
      const sent = await this.send(body, span);
      if (!sent.ok) {
        outcome = sent.reason;
        if (this.reportErrors) yield { type: 'error', reason: sent.reason, message: sent.message };
        return;
      }

      try {
        for await (const payload of readSseData(sent.response.body)) {
          const data = parseJson(payload);
          if (data === undefined) continue;  // malformed line
          const text = this.provider.decode(data);
          if (text) {
            answers++;
            yield { type: 'answer', text };
          }
        }
      } catch (error) {
        const message = `Stream from ${this.provider.name} failed: ${errorMessage(error)}`;
        this.logger.error(message);
        outcome = 'transport_error';
        if (this.reportErrors) yield { type: 'error', reason: 'transport_error', message };
      }
    } finally {
      span?.emit('stream_end', { outcome, answers }, Date.now() - started);
    }
  }

  /** Drain `streamChat` into a single string. */
  async chat(messages: ChatMessage[], model?: string): Promise<string> {
    let text = '';
    for await (const event of this.streamChat(messages, model)) {
      if (event.type === 'answer') text += event.text;
    }
    return text;
  }

  /**
   * Send the request, rotating tokens on quota errors.
   *
   * Each attempt marks the token it actually sent, so overlapping calls that
   * share the pool never exhaust a token they did not use. Attempts are capped
   * at one per pool entry plus the initial key; a pool listing a token twice
   * would otherwise hand the same exhausted token back forever.
   */
  private async send(body: ChatRequestBody, span?: TraceSpan): Promise<SendResult> {
    const payload = JSON.stringify(body);
    const maxAttempts = this.pool.size + 1;

    for (let attempt = 1; ; attempt++) {
      span?.emit('request_start', { provider: this.provider.name, model: body.model, attempt });

      const token = this.apiKey;
      let response: TransportResponse;
      let errorText: string;
      try {
        response = await this.transport(this.apiUrl, {
          method: 'POST',
          headers: this.provider.buildHeaders(token),
          body: payload,
        });
        if (response.status >= 200 && response.status < 300) {
          return { ok: true, response };
        }
        errorText = await response.text();
      } catch (error) {
        const message = `Request to ${this.apiUrl} failed: ${errorMessage(error)}`;
        this.logger.error(message);
        return { ok: false, reason: 'transport_error', message };
      }

      if (errorCode(errorText) !== QUOTA_EXHAUSTED_CODE) {
        const message = `API request failed with status ${response.status}: ${errorText}`;
        this.logger.error(message);
        return { ok: false, reason: 'http_error', message };
      }

      this.pool.markExhausted(token);
      const next = attempt < maxAttempts ? this.pool.next() : undefined;
      if (!next) {
        const message = 'Quota exhausted and no more tokens available';
        this.logger.error(message);
        return { ok: false, reason: 'pool_exhausted', message };
      }

      this.apiKey = next;
      span?.emit('token_rotated', { attempt });
    }
  }
}
