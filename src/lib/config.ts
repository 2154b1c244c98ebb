import { z } from 'zod';
import { ProviderName, PROVIDER_NAMES } from '../core/provider.js';
import { ConfigurationError } from '../core/errors.js';

export interface RelayConfig {
  provider: ProviderName;
  model: string;
  tokenFile: string;
  apiKey?: string;
  apiUrl?: string;
  traceDir?: string;
  reportErrors: boolean;
  openRouter: { referer?: string; title?: string };
}

const optional = z.string().trim().min(1).optional();

const EnvSchema = z.object({
  CLAUDE_PROVIDER: z.string().default('anthropic'),
  CLAUDE_MODEL: z.string().min(1).default('claude-3-5-sonnet-20241022'),
  CLAUDE_TOKEN_FILE: z.string().min(1).default('tokens.json'),
  CLAUDE_API_KEY: optional,
  CLAUDE_API_URL: z.string().url().optional(),
  CLAUDE_TRACE_DIR: optional,
  CLAUDE_REPORT_ERRORS: z.enum(['1', '0', 'true', 'false']).optional(),
  OPENROUTER_REFERER: optional,
  OPENROUTER_TITLE: optional,
});

/**
 * Read relay settings from environment variables.
 *
 * CLAUDE_PROVIDER: anthropic | openrouter | oneapi (default: anthropic)
 * CLAUDE_MODEL: model name (ignored by openrouter)
 * CLAUDE_TOKEN_FILE: JSON token pool (default: tokens.json)
 * CLAUDE_API_KEY: key to use before any pool token
 * CLAUDE_API_URL: endpoint override (required for oneapi)
 * CLAUDE_TRACE_DIR: write JSONL traces here
 * CLAUDE_REPORT_ERRORS: 1 | true to end failed streams with an error event
 * OPENROUTER_REFERER, OPENROUTER_TITLE: OpenRouter app identification
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid environment: ${issues}`);
  }
  const e = parsed.data;

  const provider = PROVIDER_NAMES.find(p => p === e.CLAUDE_PROVIDER);
  if (!provider) {
    throw new ConfigurationError(`Invalid CLAUDE_PROVIDER "${e.CLAUDE_PROVIDER}". Use: ${PROVIDER_NAMES.join(', ')}`);
  }

  if (provider === 'oneapi' && !e.CLAUDE_API_URL) {
    throw new ConfigurationError('CLAUDE_API_URL is required for the oneapi provider');
  }

  return {
    provider,
    model: e.CLAUDE_MODEL,
    tokenFile: e.CLAUDE_TOKEN_FILE,
    apiKey: e.CLAUDE_API_KEY,
    apiUrl: e.CLAUDE_API_URL,
    traceDir: e.CLAUDE_TRACE_DIR,
    reportErrors: e.CLAUDE_REPORT_ERRORS === '1' || e.CLAUDE_REPORT_ERRORS === 'true',
    openRouter: { referer: e.OPENROUTER_REFERER, title: e.OPENROUTER_TITLE },
  };
}
