import { ClaudeClient } from './core/claude-client.js';
import { TokenPool } from './core/token-pool.js';
import { RelayConfig } from './lib/config.js';
import { Logger, consoleLogger } from './lib/logger.js';
import { Tracer } from './lib/tracer.js';
import { Transport } from './lib/transport.js';

export { ClaudeClient, DEFAULT_MODEL, QUOTA_EXHAUSTED_CODE } from './core/claude-client.js';
export type { ClaudeClientConfig } from './core/claude-client.js';
export { TokenPool } from './core/token-pool.js';
export { readSseData, DONE_SENTINEL } from './core/sse.js';
export { ConfigurationError } from './core/errors.js';
export { resolveProvider } from './providers/index.js';
export { loadConfig } from './lib/config.js';
export type { RelayConfig } from './lib/config.js';
export { Tracer } from './lib/tracer.js';
export type { TraceSpan, TraceEvent } from './lib/tracer.js';
export { consoleLogger, stderrLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export { fetchTransport, readStream } from './lib/transport.js';
export type { Transport, TransportRequest, TransportResponse } from './lib/transport.js';
export type * from './core/types.js';
export type { ProviderAdapter, ProviderName, ProviderOptions, ChatRequestBody } from './core/provider.js';

export interface ClientOverrides {
  logger?: Logger;
  transport?: Transport;
  pool?: TokenPool;
}

/** Build a client (token pool, tracer and all) from a loaded config. */
export function createClient(config: RelayConfig, overrides: ClientOverrides = {}): ClaudeClient {
  const logger = overrides.logger || consoleLogger;
  const pool = overrides.pool || TokenPool.fromFile(config.tokenFile, logger);

  return new ClaudeClient({
    pool,
    provider: config.provider,
    apiKey: config.apiKey,
    apiUrl: config.apiUrl,
    transport: overrides.transport,
    logger,
    tracer: config.traceDir ? new Tracer(config.traceDir) : undefined,
    reportErrors: config.reportErrors,
    providerOptions: config.openRouter,
  });
}
