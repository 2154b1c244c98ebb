import { readFileSync } from 'fs';
import { z } from 'zod';
import { CredentialEntry } from './types.js';
import { errorMessage } from './errors.js';
import { Logger, consoleLogger } from '../lib/logger.js';

// === Token file schema (trust boundary: file on disk) ===

const TokenFileSchema = z.array(z.object({
  token: z.string().min(1),
  exhausted: z.boolean().default(false)
}));

/**
 * Round-robin pool of API tokens.
 *
 * Entries are never removed; order is the rotation order. The cursor only
 * moves when a token is marked exhausted, so `next()` keeps returning the
 * same token until it runs out of quota.
 *
 * All methods are synchronous and therefore run to completion on the event
 * loop; callers sharing one pool across requests need no extra locking.
 */
export class TokenPool {
  private tokens: CredentialEntry[];
  private index = 0;
  private logger: Logger;

  constructor(entries: CredentialEntry[] = [], logger: Logger = consoleLogger) {
    this.tokens = entries.map(e => ({ ...e }));
    this.logger = logger;
  }

  static fromFile(path: string, logger: Logger = consoleLogger): TokenPool {
    const pool = new TokenPool([], logger);
    pool.load(path);
    return pool;
  }

  get size(): number {
    return this.tokens.length;
  }

  get available(): number {
    return this.tokens.filter(e => !e.exhausted).length;
  }

  get cursor(): number {
    return this.index;
  }

  entries(): CredentialEntry[] {
    return this.tokens.map(e => ({ ...e }));
  }

  /** Replace the pool with the contents of a JSON token file. Failures leave the pool empty. */
  load(path: string): void {
    this.index = 0;
    try {
      const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      this.tokens = TokenFileSchema.parse(raw);
      this.logger.info(`Loaded ${this.tokens.length} token(s) from ${path}`);
    } catch (error) {
      this.logger.error(`Failed to load token file ${path}: ${errorMessage(error)}`);
      this.tokens = [];
    }
  }

  next(): string | undefined {
    const n = this.tokens.length;
    for (let probe = 0; probe < n; probe++) {
      const i = (this.index + probe) % n;
      const entry = this.tokens[i];
      if (!entry.exhausted) {
        this.logger.info(`Using token ${i + 1}/${n}`);
        return entry.token;
      }
    }
    this.logger.error(n === 0 ? 'Token pool is empty' : `All ${n} token(s) are exhausted`);
    return undefined;
  }

  markExhausted(token: string): void {
    const i = this.tokens.findIndex(e => e.token === token);
    if (i === -1) return;
    this.tokens[i].exhausted = true;
    this.index = (i + 1) % this.tokens.length;
    this.logger.warn(`Token ${i + 1}/${this.tokens.length} marked as exhausted`);
  }

  resetAll(): void {
    for (const entry of this.tokens) {
      entry.exhausted = false;
    }
    this.logger.info('Reset exhausted status of all tokens');
  }
}
