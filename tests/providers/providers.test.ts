import { test } from 'node:test';
import assert from 'node:assert';
import { resolveProvider } from '../../src/providers/index.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { ChatMessage } from '../../src/core/types.js';

const messages: ChatMessage[] = [{ role: 'user', content: 'hello' }];

test('anthropic builds x-api-key headers and a max_tokens body', () => {
  const p = resolveProvider('anthropic');
  assert.strictEqual(p.defaultUrl, 'https://api.anthropic.com/v1/messages');
  assert.deepStrictEqual(p.buildHeaders('t1'), {
    'x-api-key': 't1',
    'anthropic-version': '2023-06-01',
    'content-type': 'application/json',
    'accept': 'text/event-stream',
  });
  assert.deepStrictEqual(p.buildBody(messages, 'claude-x'), {
    model: 'claude-x',
    messages,
    max_tokens: 8192,
    stream: true,
  });
});

test('anthropic decodes only non-empty content_block_delta text', () => {
  const p = resolveProvider('anthropic');
  assert.strictEqual(p.decode({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hi' } }), 'Hi');
  assert.strictEqual(p.decode({ type: 'content_block_delta', delta: { text: '' } }), undefined);
  assert.strictEqual(p.decode({ type: 'content_block_delta', delta: { type: 'input_json_delta', partial_json: '{' } }), undefined);
  assert.strictEqual(p.decode({ type: 'message_start', message: {} }), undefined);
  assert.strictEqual(p.decode({ choices: [{ delta: { content: 'no' } }] }), undefined);
});

test('openrouter forces its model and sends identification headers', () => {
  const p = resolveProvider('openrouter');
  assert.strictEqual(p.defaultUrl, 'https://openrouter.ai/api/v1/chat/completions');
  assert.deepStrictEqual(p.buildHeaders('t1'), {
    'Authorization': 'Bearer t1',
    'Content-Type': 'application/json',
    'HTTP-Referer': 'https://localhost',
    'X-Title': 'claude-relay',
  });
  assert.deepStrictEqual(p.buildBody(messages, 'claude-3-5-sonnet-20241022'), {
    model: 'anthropic/claude-3.5-sonnet',
    messages,
    stream: true,
  });
});

test('openrouter identification headers are configurable', () => {
  const p = resolveProvider('openrouter', { referer: 'https://example.test', title: 'my-app' });
  const headers = p.buildHeaders('t1');
  assert.strictEqual(headers['HTTP-Referer'], 'https://example.test');
  assert.strictEqual(headers['X-Title'], 'my-app');
});

test('oneapi sends a bearer token and keeps the model', () => {
  const p = resolveProvider('oneapi');
  assert.strictEqual(p.defaultUrl, undefined);
  assert.deepStrictEqual(p.buildHeaders('t2'), {
    'Authorization': 'Bearer t2',
    'Content-Type': 'application/json',
  });
  assert.deepStrictEqual(p.buildBody(messages, 'claude-x'), { model: 'claude-x', messages, stream: true });
});

test('openai-style providers decode choices[0].delta.content', () => {
  for (const name of ['openrouter', 'oneapi']) {
    const p = resolveProvider(name);
    assert.strictEqual(p.decode({ choices: [{ delta: { content: 'ok' } }] }), 'ok');
    assert.strictEqual(p.decode({ choices: [{ delta: { content: null } }] }), undefined);
    assert.strictEqual(p.decode({ choices: [{ delta: {} }] }), undefined);
    assert.strictEqual(p.decode({ choices: [{ finish_reason: 'stop' }] }), undefined);
    assert.strictEqual(p.decode({ choices: [] }), undefined);
    assert.strictEqual(p.decode({ type: 'content_block_delta', delta: { text: 'no' } }), undefined);
  }
});

test('resolveProvider rejects unknown providers', () => {
  assert.throws(() => resolveProvider('gemini'), (error: unknown) => {
    assert.ok(error instanceof ConfigurationError);
    assert.strictEqual(error.message, 'Unsupported provider "gemini". Use: anthropic, openrouter, oneapi');
    return true;
  });
});
