import { test } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createClient, loadConfig } from '../src/index.js';
import { MockTransport } from './helpers/mock-transport.js';
import { RecordingLogger } from './helpers/recording-logger.js';

test('createClient loads the token file named in the config', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'relay-client-'));
  const tokenFile = join(dir, 'tokens.json');
  writeFileSync(tokenFile, JSON.stringify([{ token: 't1', exhausted: true }, { token: 't2' }]));

  const config = loadConfig({ CLAUDE_TOKEN_FILE: tokenFile, CLAUDE_PROVIDER: 'openrouter' });
  const mock = new MockTransport([{ chunks: ['data: {"choices":[{"delta":{"content":"ok"}}]}\n'] }]);
  const client = createClient(config, { logger: new RecordingLogger(), transport: mock.transport });

  assert.strictEqual(client.activeToken, 't2');
  assert.strictEqual(client.provider.name, 'openrouter');
  assert.strictEqual(await client.chat([{ role: 'user', content: 'hi' }]), 'ok');
  assert.strictEqual(mock.requests[0].headers['Authorization'], 'Bearer t2');

  rmSync(dir, { recursive: true, force: true });
});
